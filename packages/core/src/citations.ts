import type { Citation, PassageReference } from "@papertrail/types";
import { CitationResolutionError } from "@papertrail/errors";
import type { Logger } from "@papertrail/logger";

// [3], [1, 2], [1; 4], [2-4]
const MARKER_PATTERN = /\[(\d+(?:\s*[-–,;]\s*\d+)*)\]/g;

export interface BoundCitations {
  citations: Citation[];
  /** Reference numbers that matched no passage. */
  unresolved: number[];
  /** Marker parts that name no number, such as `3-1` or `1-2-3`. */
  malformed: string[];
}

export interface ParsedMarker {
  numbers: number[];
  malformed: string[];
}

/**
 * Numbers named by a marker body, in order, without repeats. Ranges are
 * expanded up to `maxRef`; reversed ranges and chained dashes are returned
 * as malformed parts.
 */
export function parseMarker(body: string, maxRef: number): ParsedMarker {
  const numbers: number[] = [];
  const malformed: string[] = [];

  for (const raw of body.split(/[,;]/)) {
    const part = raw.trim();
    const range = /^(\d+)\s*[-–]\s*(\d+)$/.exec(part);
    if (range) {
      const from = Number(range[1]);
      const to = Number(range[2]);
      if (from > to) {
        malformed.push(part);
        continue;
      }
      // Bound the expansion: a range past the last reference resolves nothing further
      for (let n = from; n <= Math.min(to, Math.max(from, maxRef + 1)); n++) numbers.push(n);
      continue;
    }
    if (/^\d+$/.test(part)) {
      numbers.push(Number(part));
    } else {
      malformed.push(part);
    }
  }

  return { numbers: [...new Set(numbers)], malformed };
}

export function parseMarkerNumbers(body: string, maxRef: number): number[] {
  return parseMarker(body, maxRef).numbers;
}

/** The sentence a marker is attached to, with other markers removed. */
export function claimBefore(answer: string, offset: number): string {
  const body = answer
    .slice(0, offset)
    .replace(MARKER_PATTERN, "")
    .trimEnd()
    .replace(/[.!?]+$/, "");

  const boundary = Math.max(
    body.lastIndexOf(". "),
    body.lastIndexOf("! "),
    body.lastIndexOf("? "),
    body.lastIndexOf("\n"),
  );

  return body
    .slice(boundary + 1)
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Resolves the citation markers of a generated answer through the reference
 * map built with the prompt. Numbers outside the map and unreadable marker
 * parts are logged and dropped; a marker with no resolvable number yields no
 * citation.
 */
export function bindCitations(
  answer: string,
  references: ReadonlyMap<number, PassageReference>,
  logger?: Logger,
): BoundCitations {
  const citations: Citation[] = [];
  const unresolved: number[] = [];
  const malformed: string[] = [];

  for (const match of answer.matchAll(MARKER_PATTERN)) {
    const marker = match[0];
    const start = match.index ?? 0;
    const resolved: number[] = [];
    const paperIds: string[] = [];

    const parsed = parseMarker(match[1] ?? "", references.size);

    for (const part of parsed.malformed) {
      const error = new CitationResolutionError(part, { details: { marker } });
      logger?.warn({ err: error, marker }, "Dropping malformed citation");
      malformed.push(part);
    }

    for (const n of parsed.numbers) {
      const ref = references.get(n);
      if (!ref) {
        const error = new CitationResolutionError(n, { details: { marker } });
        logger?.warn({ err: error, marker }, "Dropping unresolved citation");
        unresolved.push(n);
        continue;
      }
      resolved.push(n);
      if (!paperIds.includes(ref.paperId)) paperIds.push(ref.paperId);
    }

    if (resolved.length === 0) continue;

    citations.push({
      marker,
      start,
      end: start + marker.length,
      claim: claimBefore(answer, start),
      references: resolved,
      paperIds,
    });
  }

  return { citations, unresolved, malformed };
}
