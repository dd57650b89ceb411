import { readFileSync } from "node:fs";
import { z } from "zod";
import type { RefinedQuery, RefinementStep } from "@papertrail/types";

export const MAX_KEYWORDS = 12;

export interface DomainLexicon {
  /** Spelling variants and abbreviations mapped to a canonical term. */
  aliases: Record<string, string>;
  /** Canonical domain terms, possibly multi-word. */
  terms: string[];
}

export interface QueryRefinerOptions {
  stopwords?: Iterable<string>;
  lexicon?: DomainLexicon;
  maxKeywords?: number;
}

const stopwordsSchema = z.array(z.string());
const lexiconSchema = z.object({
  aliases: z.record(z.string()),
  terms: z.array(z.string()),
});

function readData(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`../data/${name}`, import.meta.url), "utf8"));
}

export function loadStopwords(): string[] {
  return stopwordsSchema.parse(readData("stopwords.json"));
}

export function loadDomainLexicon(): DomainLexicon {
  return lexiconSchema.parse(readData("domain-terms.json"));
}

/**
 * Lowercase, drop punctuation (hyphens survive only between word characters)
 * and collapse whitespace.
 */
export function normalizeText(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^\p{L}\p{N}\s-]+/gu, " ")
    .replace(/-{2,}/g, " ")
    .replace(/(?<![\p{L}\p{N}])-|-(?![\p{L}\p{N}])/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Rule-based rewriting of a question into a search query. Pure and
 * deterministic: the rules run once each, in a fixed order, and `steps`
 * lists the ones that changed the query.
 */
export class QueryRefiner {
  private stopwords: ReadonlySet<string>;
  private aliases: ReadonlyMap<string, string>;
  private domainTerms: ReadonlySet<string>;
  private maxPhraseWords: number;
  private maxKeywords: number;

  constructor(options?: QueryRefinerOptions) {
    const lexicon = options?.lexicon ?? loadDomainLexicon();
    this.stopwords = new Set(options?.stopwords ?? loadStopwords());
    this.aliases = new Map(Object.entries(lexicon.aliases));
    this.domainTerms = new Set([...lexicon.terms, ...Object.values(lexicon.aliases)]);
    this.maxKeywords = options?.maxKeywords ?? MAX_KEYWORDS;

    const phrases = [...this.aliases.keys(), ...this.domainTerms];
    this.maxPhraseWords = Math.max(1, ...phrases.map((p) => p.split(" ").length));
  }

  refine(raw: string): RefinedQuery {
    const normalized = normalizeText(raw);
    if (normalized.length === 0) {
      return { kind: "empty" };
    }

    const steps: RefinementStep[] = [];
    let keywords = normalized.split(" ");

    const apply = (step: RefinementStep, next: string[]): void => {
      if (!sameSequence(keywords, next)) {
        steps.push(step);
        keywords = next;
      }
    };

    if (normalized !== raw) steps.push("normalize");

    apply("normalize-domain-terms", this.mergeDomainTerms(keywords));

    // A question made only of stopwords is searched as written
    const trimmed = keywords.filter((k) => !this.stopwords.has(k));
    if (trimmed.length > 0) apply("trim-stopwords", trimmed);

    apply("dedupe", [...new Set(keywords)]);

    apply("boost-domain-terms", [
      ...keywords.filter((k) => this.domainTerms.has(k)),
      ...keywords.filter((k) => !this.domainTerms.has(k)),
    ]);

    apply("cap-keywords", keywords.slice(0, this.maxKeywords));

    return { kind: "refined", text: keywords.join(" "), keywords, steps };
  }

  /** Greedy longest-phrase match against aliases and multi-word terms. */
  private mergeDomainTerms(words: string[]): string[] {
    const merged: string[] = [];
    let i = 0;

    while (i < words.length) {
      let width = 1;
      let replacement = words[i] ?? "";

      for (let n = Math.min(this.maxPhraseWords, words.length - i); n >= 1; n--) {
        const phrase = words.slice(i, i + n).join(" ");
        const canonical =
          this.aliases.get(phrase) ?? (this.domainTerms.has(phrase) ? phrase : undefined);
        if (canonical !== undefined) {
          width = n;
          replacement = canonical;
          break;
        }
      }

      merged.push(replacement);
      i += width;
    }

    return merged;
  }
}
