/**
 * Catalog fallback: match a query against the live resource-type catalog
 * when none of the fixed matchers fire.
 */

import { lastSegment } from "../resource-id.js";

export type CatalogMatch = {
  providerType: string;
  /** The query term that matched, used as the display keyword. */
  keyword: string;
  score: number;
};

const STOP_WORDS = new Set([
  "all", "and", "any", "are", "azure", "can", "current", "display", "find", "for",
  "get", "give", "have", "how", "list", "many", "our", "please", "resource",
  "resources", "show", "subscription", "the", "there", "what", "which", "with", "you",
]);

const MIN_TOKEN_LENGTH = 3;

/** Content words of a query, lower-cased. */
export function tokenize(query: string): string[] {
  return query
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length >= MIN_TOKEN_LENGTH && !STOP_WORDS.has(t));
}

/** Tokens plus adjacent pairs run together ("managed disks" -> "manageddisks"). */
export function candidateTerms(tokens: readonly string[]): string[] {
  const terms = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) {
    terms.push(`${tokens[i]}${tokens[i + 1]}`);
  }
  return terms;
}

export function scoreTerm(term: string, providerType: string): number {
  const segment = lastSegment(providerType).toLowerCase();
  if (segment === term || segment === `${term}s` || segment === `${term}es`) return 3;
  if (segment.startsWith(term)) return 2;
  if (segment.includes(term)) return 1;
  return 0;
}

function isBetter(candidate: CatalogMatch, best: CatalogMatch | null): boolean {
  if (!best) return true;
  if (candidate.score !== best.score) return candidate.score > best.score;
  if (candidate.keyword.length !== best.keyword.length) return candidate.keyword.length > best.keyword.length;
  if (candidate.providerType.length !== best.providerType.length) {
    return candidate.providerType.length < best.providerType.length;
  }
  return candidate.providerType < best.providerType;
}

/**
 * Best catalog entry for the query, or null when no term overlaps any type name.
 * Ranking: score, then longer term, then shorter type name, then alphabetical.
 */
export function matchResourceType(query: string, catalog: readonly string[]): CatalogMatch | null {
  const terms = candidateTerms(tokenize(query));
  let best: CatalogMatch | null = null;

  for (const providerType of catalog) {
    for (const term of terms) {
      const score = scoreTerm(term, providerType);
      if (score === 0) continue;
      const candidate = { providerType, keyword: term, score };
      if (isBetter(candidate, best)) best = candidate;
    }
  }

  return best;
}
