export type AffiliationClass = "industry" | "academic";

export interface Author {
  readonly name: string; // "<ForeName> <LastName>"
  readonly affiliation: string;
  readonly email: string | null;
  readonly isCorresponding: boolean;
}

export interface Article {
  readonly sourceId: string; // PMID
  readonly title: string;
  readonly publicationDate: string; // YYYY, YYYY-MM, YYYY-MM-DD or DATE_NOT_AVAILABLE
  readonly doi: string;
  readonly allAuthors: readonly Author[];
  readonly industryAuthors: readonly Author[];
  readonly correspondingEmails: readonly string[];
}

export const NO_TITLE = "No title available";
export const DATE_NOT_AVAILABLE = "Date not available";

/**
 * Outcome of extracting one raw article record.
 * Only `included` carries an article; the other two explain why there is none.
 */
export type ArticleExtraction =
  | { status: "included"; article: Article }
  | { status: "excluded"; sourceId: string; reason: "no-industry-authors" }
  | { status: "skipped"; sourceId: string; reason: string };

export interface SkippedRecord {
  index: number;
  sourceId: string;
  reason: string;
}

export interface AggregateStats {
  processed: number;
  included: number;
  excluded: number;
  skipped: number;
}

export interface AggregateResult {
  articles: Article[];
  stats: AggregateStats;
}
