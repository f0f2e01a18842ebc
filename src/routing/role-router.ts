import type { WorkerRole } from "../planner/types.js";

/**
 * Keyword routing table from description to worker role. Add a role by
 * extending WorkerRole and this table; order breaks ties.
 */
export const ROLE_KEYWORDS: ReadonlyArray<readonly [WorkerRole, readonly string[]]> = [
  ["researcher", ["literature", "paper", "search", "survey", "review", "cite", "arxiv", "pubmed", "reference"]],
  ["implementer", ["code", "implement", "write", "function", "class", "script", "bug", "fix", "feature", "test"]],
  ["reviewer", ["review", "check", "audit", "inspect", "quality", "improve"]],
  ["validator", ["validate", "attack", "falsify", "verify", "test", "leak", "statistical", "reproducib"]],
  ["writer", ["write", "draft", "paper", "abstract", "introduction", "methods", "results", "discussion", "document"]],
  ["refactorer", ["refactor", "clean", "optimize", "document", "style", "lint", "format", "organize"]],
];

export const DEFAULT_ROLE: WorkerRole = "implementer";

/** Count keyword hits (substring, case-insensitive) per role and pick the best. */
export function routeRole(description: string): WorkerRole {
  const text = description.toLowerCase();
  let best: WorkerRole = DEFAULT_ROLE;
  let bestScore = 0;
  for (const [role, keywords] of ROLE_KEYWORDS) {
    const score = keywords.filter((kw) => text.includes(kw)).length;
    if (score > bestScore) {
      best = role;
      bestScore = score;
    }
  }
  return best;
}
