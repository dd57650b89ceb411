import type { Passage, PassageReference, PromptFormat } from "@papertrail/types";

export interface BuiltPrompt {
  prompt: string;
  /** Reference token number → passage it was assigned to. */
  references: Map<number, PassageReference>;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function renderXml(passages: readonly Passage[]): string {
  const parts = passages.map(
    (p, i) =>
      `<passage ref="${String(i + 1)}" title="${escapeXml(p.paperTitle)}">\n` +
      `${escapeXml(p.text)}\n</passage>`,
  );
  return `<sources>\n${parts.join("\n")}\n</sources>`;
}

function renderMarkdown(passages: readonly Passage[]): string {
  const parts = passages.map((p, i) => `### [${String(i + 1)}] ${p.paperTitle}\n\n${p.text}`);
  return parts.join("\n\n---\n\n");
}

function renderPlain(passages: readonly Passage[]): string {
  const parts = passages.map((p, i) => `[${String(i + 1)}] (Source: ${p.paperTitle})\n${p.text}`);
  return parts.join("\n\n");
}

export function renderSources(passages: readonly Passage[], format: PromptFormat): string {
  switch (format) {
    case "xml":
      return renderXml(passages);
    case "markdown":
      return renderMarkdown(passages);
    case "plain":
    default:
      return renderPlain(passages);
  }
}

const INSTRUCTIONS = `You are an expert research assistant. Answer the question using only the numbered sources below; do not use any other knowledge.
- Begin with a direct definition of the main topic, then synthesize the key concepts, methods and findings across the sources.
- After every claim taken from a source, cite it with its number in square brackets, for example [1] or [1, 3].
- Cite only the numbered sources given here.
- If the sources do not contain enough information, say: "I could not find a definitive answer in the provided sources."`;

/**
 * Renders the generation prompt and assigns reference tokens `[1]..[n]` to
 * the context passages in order. The returned map is the only way answer
 * markers are resolved back to papers.
 */
export function buildPrompt(
  question: string,
  refinedQuery: string,
  context: readonly Passage[],
  format: PromptFormat,
): BuiltPrompt {
  const references = new Map<number, PassageReference>();
  context.forEach((passage, i) => {
    references.set(i + 1, { token: i + 1, passageId: passage.id, paperId: passage.paperId });
  });

  const prompt = [
    INSTRUCTIONS,
    `SOURCES:\n${renderSources(context, format)}`,
    `SEARCH TERMS:\n${refinedQuery}`,
    `QUESTION:\n${question}`,
    "ANSWER:",
  ].join("\n\n");

  return { prompt, references };
}
