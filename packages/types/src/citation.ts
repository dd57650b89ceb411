/**
 * Resolved citation marker in a generated answer.
 *
 * `start`/`end` are the marker's offsets in the answer text, `claim` is the
 * sentence the marker is attached to. `references` are the reference tokens
 * that resolved; `paperIds` are their papers, deduplicated in marker order.
 */
export interface Citation {
  marker: string;
  start: number;
  end: number;
  claim: string;
  references: number[];
  paperIds: string[];
}

export interface PassageReference {
  token: number;
  passageId: string;
  paperId: string;
}
