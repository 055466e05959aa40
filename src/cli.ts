/**
 * Azure Agent — CLI Commands
 *
 * `azure-agent serve`         start the chat completion API
 * `azure-agent ask <query>`   answer one query locally and print the markdown
 * `azure-agent check-config`  report missing Azure environment variables
 */

import { Command } from "commander";
import { loadConfig, loadDotEnv, reportConfig, validateConfig, type AgentConfig } from "./config.js";
import { createLogger, type ConsoleSink } from "./logger.js";
import { formatAzureCallTrace, onAzureCall, setAzureTraceLogger, setAzureTracing } from "./diagnostics.js";
import { createCredentialsManagerFromConfig } from "./credentials/index.js";
import { AzureService, type AzureInventory } from "./inventory.js";
import { IntentHandler } from "./intent/index.js";
import { startApiServer, type ApiServerHandle } from "./api/server.js";
import { formatErrorMessage } from "./retry.js";
import type { Logger } from "./types.js";
import { VERSION } from "./version.js";

// =============================================================================
// Types
// =============================================================================

export type AgentCliContext = {
  program: Command;
  /** Environment to configure from. When omitted, `.env` is loaded into process.env first. */
  env?: Record<string, string | undefined>;
  /** Command output (default: stdout). */
  write?: (text: string) => void;
  /** Log destination (default: console). */
  sink?: ConsoleSink;
  /** Inventory factory; defaults to the Azure SDK-backed service. */
  createInventory?: (config: AgentConfig) => AzureInventory;
  /** Receives the running server so callers can close it. */
  onServerStarted?: (handle: ApiServerHandle) => void;
};

// =============================================================================
// Runtime
// =============================================================================

function defaultInventory(config: AgentConfig): AzureInventory {
  const credentials = createCredentialsManagerFromConfig(config);
  return new AzureService(credentials, config.subscriptionId ?? "", {
    maxAttempts: config.retryMaxAttempts,
  });
}

/** Log every SDK call at DEBUG. Returns the unsubscribe function. */
export function wireDiagnostics(config: AgentConfig, logger: Logger): () => void {
  if (config.logLevel !== "DEBUG") return () => {};
  setAzureTracing(true);
  setAzureTraceLogger(logger);
  return onAzureCall((trace) => logger.debug(formatAzureCallTrace(trace)));
}

// =============================================================================
// CLI Registration
// =============================================================================

export function registerAgentCli(ctx: AgentCliContext): void {
  const write = ctx.write ?? ((text: string) => void process.stdout.write(text));
  const createInventory = ctx.createInventory ?? defaultInventory;

  const configure = (): AgentConfig => {
    if (!ctx.env) loadDotEnv();
    return loadConfig(ctx.env ?? process.env);
  };

  const makeHandler = (config: AgentConfig, logger: Logger): IntentHandler => {
    wireDiagnostics(config, logger);
    return new IntentHandler(createInventory(config), config.subscriptionId ?? "", logger);
  };

  // ---------------------------------------------------------------------------
  // serve
  // ---------------------------------------------------------------------------
  ctx.program
    .command("serve")
    .description("Start the OpenAI-compatible chat completion API")
    .option("-p, --port <port>", "Port to listen on (default: PORT or 6003)")
    .option("-H, --host <host>", "Interface to bind (default: HOST or 0.0.0.0)")
    .action(async (opts: { port?: string; host?: string }) => {
      const config = configure();
      const logger = createLogger("azure-agent", { level: config.logLevel, sink: ctx.sink });
      logger.info("Starting Azure-Agent...");
      reportConfig(config, logger);

      const port = opts.port !== undefined ? Number(opts.port) : config.port;
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        logger.error(`Invalid port: ${opts.port}`);
        process.exitCode = 1;
        return;
      }

      const handle = await startApiServer({
        port,
        host: opts.host ?? config.host,
        processor: makeHandler(config, logger),
        modelName: config.modelName,
        apiKey: config.apiKey,
        corsOrigin: config.corsOrigin,
        logger: createLogger("azure-agent.api", { level: config.logLevel, sink: ctx.sink }),
      });
      ctx.onServerStarted?.(handle);
    });

  // ---------------------------------------------------------------------------
  // ask
  // ---------------------------------------------------------------------------
  ctx.program
    .command("ask")
    .description("Answer one natural-language query and print the markdown")
    .argument("<query...>", "Query, e.g. \"show all vms\"")
    .action(async (words: string[]) => {
      const config = configure();
      const logger = createLogger("azure-agent", { level: config.logLevel, sink: ctx.sink });
      reportConfig(config, logger);

      try {
        const answer = await makeHandler(config, logger).processQuery(words.join(" "));
        write(answer.endsWith("\n") ? answer : `${answer}\n`);
      } catch (err) {
        logger.error(`Query failed: ${formatErrorMessage(err)}`);
        process.exitCode = 1;
      }
    });

  // ---------------------------------------------------------------------------
  // check-config
  // ---------------------------------------------------------------------------
  ctx.program
    .command("check-config")
    .description("Report missing Azure environment variables")
    .action(() => {
      const config = configure();
      const missing = validateConfig(config);
      if (missing.length === 0) {
        write(`Configuration OK (credential method: ${config.credentialMethod})\n`);
        return;
      }
      write(`Missing required environment variables: ${missing.join(", ")}\n`);
      process.exitCode = 1;
    });
}

export function createAgentProgram(ctx: Omit<AgentCliContext, "program"> = {}): Command {
  const program = new Command();
  program
    .name("azure-agent")
    .description("Natural-language, read-only queries over Azure infrastructure")
    .version(VERSION);
  registerAgentCli({ ...ctx, program });
  return program;
}
