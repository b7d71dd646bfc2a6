// ─── Labels ───────────────────────────────────────────────────────
export type Label = 'yes' | 'no';

/** Keyword-stage outcome; `uncertain` never leaves the classifier */
export type Verdict = Label | 'uncertain';

// ─── Keyword vocabulary ───────────────────────────────────────────
export interface KeywordVocabulary {
  /** Matched verbatim against the raw bio */
  symbols: string[];
  /** Substrings of the folded bio with punctuation removed */
  fragments: string[];
  /** Names and words that contain a fragment but carry no signal ("Christopher") */
  fragmentExceptions: string[];
  /** Whole words / phrases of the folded bio */
  terms: string[];
  /** Book names, only counted when followed by chapter:verse */
  books: string[];
  bookAbbreviations: string[];
}

// ─── LLM fallback seam ────────────────────────────────────────────
export interface UncertainResolver {
  /**
   * Label every bio with one LLM round trip. The result is aligned by index;
   * `null` marks a bio the reply did not label. Rejects when the stage fails
   * as a whole.
   */
  resolveUncertain(bios: readonly string[], prompt: string, requestId?: string): Promise<Array<Label | null>>;
}

export interface ClassifyOptions {
  /** One-off prompt for this call; the stored prompt is left untouched */
  prompt?: string;
  requestId?: string;
}
