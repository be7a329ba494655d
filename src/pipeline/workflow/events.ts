import { workflowEvent } from "@llamaindex/workflow-core";
import type { AggregateStats, Article } from "../../types/domain.js";
import type { SearchOptions } from "../../types/interfaces/pipeline.js";
import type { RawPubmedArticle } from "../../types/zodSchemas.js";

export type FilterStage = "search" | "fetch" | "extract" | "report";

/** Event fired to start the pipeline with a query */
export const searchEvent = workflowEvent<{
  query: string;
  options: SearchOptions;
}>();

/** Event fired when the search returned ids to fetch */
export const fetchEvent = workflowEvent<{
  query: string;
  ids: string[];
}>();

/** Event fired when raw records are fetched and ready for extraction */
export const extractEvent = workflowEvent<{
  query: string;
  ids: string[];
  records: RawPubmedArticle[];
}>();

/** Event fired when industry-affiliated articles are selected */
export const reportEvent = workflowEvent<{
  query: string;
  idsFound: number;
  articles: Article[];
  stats: AggregateStats;
}>();

export interface FilterOutcome {
  success: boolean;
  query: string;
  idsFound: number;
  articles: Article[];
  stats: AggregateStats;
  destination?: string;
  error?: string;
}

/** Event fired when the report is written or the pipeline failed */
export const completeEvent = workflowEvent<FilterOutcome>();

/** Event fired on any error in the pipeline */
export const errorEvent = workflowEvent<{
  stage: FilterStage;
  error: string;
  query: string;
}>();
