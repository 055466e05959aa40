/**
 * Azure Agent — Configuration Tests
 */

import { describe, it, expect, vi } from "vitest";
import { loadConfig, validateConfig, reportConfig, DEFAULT_PORT } from "./config.js";
import { ConfigError } from "./errors.js";

const COMPLETE_ENV = {
  AZURE_TENANT_ID: "tenant-1",
  AZURE_CLIENT_ID: "client-1",
  AZURE_CLIENT_SECRET: "test-secret",
  AZURE_SUBSCRIPTION_ID: "sub-1",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.credentialMethod).toBe("service-principal");
    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.logLevel).toBe("INFO");
    expect(config.corsOrigin).toBe("*");
    expect(config.modelName).toBe("azure-agent");
    expect(config.retryMaxAttempts).toBe(3);
    expect(config.apiKey).toBeUndefined();
  });

  it("reads and converts environment values", () => {
    const config = loadConfig({
      ...COMPLETE_ENV,
      PORT: "8080",
      LOG_LEVEL: "debug",
      AZURE_CREDENTIAL_METHOD: "cli",
      API_KEY: "test-key",
      AZURE_RETRY_MAX_ATTEMPTS: "5",
    });
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("DEBUG");
    expect(config.credentialMethod).toBe("cli");
    expect(config.apiKey).toBe("test-key");
    expect(config.retryMaxAttempts).toBe(5);
    expect(config.subscriptionId).toBe("sub-1");
  });

  it("maps WARN to WARNING", () => {
    expect(loadConfig({ LOG_LEVEL: "warn" }).logLevel).toBe("WARNING");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ AZURE_SUBSCRIPTION_ID: "  ", HOST: "" });
    expect(config.subscriptionId).toBeUndefined();
    expect(config.host).toBe("0.0.0.0");
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/Invalid configuration for port/);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/Invalid configuration for logLevel/);
  });

  it("rejects an unknown credential method", () => {
    expect(() => loadConfig({ AZURE_CREDENTIAL_METHOD: "password" })).toThrow(ConfigError);
  });
});

describe("validateConfig", () => {
  it("returns nothing for a complete service principal setup", () => {
    expect(validateConfig(loadConfig(COMPLETE_ENV))).toEqual([]);
  });

  it("lists every missing variable in order", () => {
    expect(validateConfig(loadConfig({}))).toEqual([
      "AZURE_TENANT_ID",
      "AZURE_CLIENT_ID",
      "AZURE_CLIENT_SECRET",
      "AZURE_SUBSCRIPTION_ID",
    ]);
  });

  it("only requires the subscription for other credential methods", () => {
    expect(validateConfig(loadConfig({ AZURE_CREDENTIAL_METHOD: "managed-identity" }))).toEqual([
      "AZURE_SUBSCRIPTION_ID",
    ]);
    expect(validateConfig(loadConfig({ AZURE_CREDENTIAL_METHOD: "default", AZURE_SUBSCRIPTION_ID: "sub-1" }))).toEqual([]);
  });
});

describe("reportConfig", () => {
  it("logs an error and a warning when incomplete", () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const ok = reportConfig(loadConfig({ AZURE_CREDENTIAL_METHOD: "cli" }), logger);

    expect(ok).toBe(false);
    expect(logger.error).toHaveBeenCalledWith("Missing required environment variables: AZURE_SUBSCRIPTION_ID");
    expect(logger.warn).toHaveBeenCalledWith(
      "Configuration is incomplete. Azure SDK calls will likely fail until .env is properly configured.",
    );
  });

  it("stays quiet when complete", () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    expect(reportConfig(loadConfig(COMPLETE_ENV), logger)).toBe(true);
    expect(logger.error).not.toHaveBeenCalled();
  });
});
