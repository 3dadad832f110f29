/**
 * A feed entry that has not been accepted into the store yet. Only the link
 * and title travel; the body is fetched later, and only for unseen URLs.
 */
export type Candidate = {
  readonly title: string;
  readonly url: string;
};

export type PollResult = {
  readonly feedUrl: string;
  readonly candidates: ReadonlyArray<Candidate>;
  readonly error: string | null;
};

export type ExtractionStrategy = "structural" | "readability";

export type ExtractionResult = {
  readonly title: string;
  /** Normalized markup: p, h3, h4, img and inline formatting only. Never empty. */
  readonly contentHtml: string;
  readonly imageUrl: string | null;
  readonly shortDescription: string;
  readonly strategy: ExtractionStrategy;
};

/**
 * Where a candidate ended up after one pass through the pipeline.
 */
export type CandidateOutcome =
  | { readonly state: "skipped_existing" }
  | { readonly state: "extraction_failed"; readonly error: string }
  | { readonly state: "persisted_as_duplicate"; readonly articleId: number | null }
  | { readonly state: "hosting_failed"; readonly error: string }
  | { readonly state: "insert_conflict" }
  | {
      readonly state: "submitted_for_moderation";
      readonly articleId: number;
      readonly hostedUrl: string;
    }
  | {
      readonly state: "moderation_failed";
      readonly articleId: number;
      readonly hostedUrl: string;
      readonly error: string;
    };

export type TickSummary = {
  readonly candidates: number;
  readonly outcomes: Readonly<Partial<Record<CandidateOutcome["state"] | "failed", number>>>;
};
