import type { Citation, Paper, PaperSource, Passage, PromptFormat } from "@papertrail/types";
import { CollaboratorPermanentError } from "@papertrail/errors";
import type { RetryPolicy } from "@papertrail/errors";
import type { IGenerationProvider } from "@papertrail/generation";
import type { Logger } from "@papertrail/logger";
import { buildPrompt } from "./prompt-builder.js";
import { bindCitations } from "./citations.js";

export interface AnswerGeneratorDependencies {
  provider: IGenerationProvider;
  retry: RetryPolicy;
  logger: Logger;
}

export interface AnswerGeneratorOptions {
  promptFormat: PromptFormat;
}

export interface GenerationInput {
  question: string;
  refinedQuery: string;
  context: readonly Passage[];
  /** Papers the context was drawn from, for source metadata. */
  papers: readonly Paper[];
}

export interface GeneratedAnswer {
  answer: string;
  citations: Citation[];
  /** Cited papers in order of first citation. */
  sources: PaperSource[];
  model: string;
}

function toSource(
  paperId: string,
  papers: ReadonlyMap<string, Paper>,
  fallbackTitle: string,
): PaperSource {
  const paper = papers.get(paperId);
  if (!paper) return { id: paperId, title: fallbackTitle, url: null };

  const source: PaperSource = { id: paper.id, title: paper.title, url: paper.url };
  if (paper.year !== undefined) source.year = paper.year;
  return source;
}

/**
 * One generation call per request. Retries follow the injected policy; a
 * failure after that is thrown for the pipeline to turn into an outcome.
 */
export class AnswerGenerator {
  private deps: AnswerGeneratorDependencies;
  private options: AnswerGeneratorOptions;

  constructor(deps: AnswerGeneratorDependencies, options: AnswerGeneratorOptions) {
    this.deps = deps;
    this.options = options;
  }

  async generate(input: GenerationInput): Promise<GeneratedAnswer> {
    const { provider, retry, logger } = this.deps;
    const { prompt, references } = buildPrompt(
      input.question,
      input.refinedQuery,
      input.context,
      this.options.promptFormat,
    );

    const completion = await retry.execute(
      () => provider.complete(prompt),
      `${provider.name}.complete`,
    );

    const answer = completion.text.trim();
    if (answer.length === 0) {
      throw new CollaboratorPermanentError(`${provider.name}: empty completion`, provider.name);
    }

    const { citations, unresolved, malformed } = bindCitations(answer, references, logger);
    if (unresolved.length > 0 || malformed.length > 0) {
      logger.info({ unresolved, malformed }, "Answer contained citations outside the context");
    }

    const papers = new Map(input.papers.map((p) => [p.id, p]));
    const titles = new Map(input.context.map((p) => [p.paperId, p.paperTitle]));
    const sources: PaperSource[] = [];
    const seen = new Set<string>();

    for (const citation of citations) {
      for (const paperId of citation.paperIds) {
        if (seen.has(paperId)) continue;
        seen.add(paperId);
        sources.push(toSource(paperId, papers, titles.get(paperId) ?? paperId));
      }
    }

    return { answer, citations, sources, model: completion.model };
  }
}
