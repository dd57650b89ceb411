import type { Passage, RetrievalResult } from "@papertrail/types";
import { estimateTokens } from "./tokens.js";

export interface ContextOptions {
  /** Token budget for all selected passages together. */
  maxTokens: number;
  maxPassagesPerPaper: number;
}

export interface AssembledContext {
  passages: Passage[];
  tokens: number;
}

/**
 * Greedy selection in descending score order (ties keep retrieval order).
 * Papers at their cap and repeated passages are skipped; selection stops at
 * the first passage that would overflow the budget.
 */
export function assembleContext(
  retrieval: RetrievalResult,
  options: ContextOptions,
): AssembledContext {
  const ranked = [...retrieval].sort((a, b) => b.score - a.score);
  const perPaper = new Map<string, number>();
  const seen = new Set<string>();
  const passages: Passage[] = [];
  let tokens = 0;

  for (const { passage } of ranked) {
    if (seen.has(passage.id)) continue;

    const fromPaper = perPaper.get(passage.paperId) ?? 0;
    if (fromPaper >= options.maxPassagesPerPaper) continue;

    const cost = estimateTokens(passage.text);
    if (tokens + cost > options.maxTokens) break;

    seen.add(passage.id);
    perPaper.set(passage.paperId, fromPaper + 1);
    passages.push(passage);
    tokens += cost;
  }

  return { passages, tokens };
}
