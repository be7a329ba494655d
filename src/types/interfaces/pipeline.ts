import type { Article } from "../domain.js";
import type { RawPubmedArticle } from "../zodSchemas.js";

export interface SearchOptions {
    maxResults?: number;
    /** YYYY, YYYY/MM or YYYY/MM/DD */
    minDate?: string;
    maxDate?: string;
    retStart?: number;
}

/**
 * Upstream boundary of the pipeline
 * Finds record ids for a query and fetches the raw records behind them
 */
export interface IArticleSource {
    name: string;
    search(query: string, options?: SearchOptions): Promise<string[]>;
    /** Raw records in the order of `ids`. */
    fetchRecords(ids: readonly string[]): Promise<RawPubmedArticle[]>;
}

export interface ReportSummary {
    articlesWritten: number;
    /** File the report was written to, when the sink writes files. */
    destination?: string;
}

/**
 * Downstream boundary of the pipeline
 */
export interface IReportSink {
    name: string;
    write(articles: readonly Article[]): Promise<ReportSummary>;
}
