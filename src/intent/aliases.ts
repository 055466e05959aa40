/**
 * Keyword -> provider resource type table for generic discovery.
 *
 * Order matters: the first keyword found in the query wins.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import rawAliases from "./service-aliases.json" with { type: "json" };
import type { ServiceAlias } from "./types.js";

const ServiceAliasTableSchema = Type.Array(
  Type.Object({
    keyword: Type.String({ minLength: 1 }),
    providerType: Type.String({ pattern: "^[A-Za-z.]+/[A-Za-z/]+$" }),
  }),
);

function loadAliases(): readonly ServiceAlias[] {
  if (!Value.Check(ServiceAliasTableSchema, rawAliases)) {
    const first = Value.Errors(ServiceAliasTableSchema, rawAliases).First();
    throw new Error(`service-aliases.json is malformed at ${first?.path ?? "/"}: ${first?.message ?? "unknown"}`);
  }
  return rawAliases;
}

export const SERVICE_ALIASES: readonly ServiceAlias[] = loadAliases();

/** First alias whose keyword occurs in the (lower-cased) query. */
export function findServiceAlias(query: string, aliases: readonly ServiceAlias[] = SERVICE_ALIASES): ServiceAlias | null {
  return aliases.find((alias) => query.includes(alias.keyword)) ?? null;
}
