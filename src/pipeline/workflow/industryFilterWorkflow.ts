import { createWorkflow } from "@llamaindex/workflow-core";
import {
  searchEvent,
  fetchEvent,
  extractEvent,
  reportEvent,
  completeEvent,
  errorEvent,
  type FilterOutcome,
} from "./events.js";
import { aggregateArticles } from "../aggregate/index.js";
import type { AffiliationClassifier } from "../classify/index.js";
import type { AggregateStats } from "../../types/domain.js";
import type {
  IArticleSource,
  IReportSink,
  SearchOptions,
} from "../../types/interfaces/pipeline.js";
import { silentLogger, type Logger } from "../../utils/logger.js";

export interface IndustryFilterDependencies {
  source: IArticleSource;
  sink: IReportSink;
  classifier?: AffiliationClassifier;
  logger?: Logger;
}

const EMPTY_STATS: AggregateStats = {
  processed: 0,
  included: 0,
  excluded: 0,
  skipped: 0,
};

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createIndustryFilterWorkflow(deps: IndustryFilterDependencies) {
  const workflow = createWorkflow();
  const logger = deps.logger ?? silentLogger;

  workflow.handle([searchEvent], async (context, event) => {
    const { sendEvent } = context;
    const { query, options } = event.data;

    logger.debug(`[Search Handler] Searching with ${deps.source.name}: ${query}`);

    try {
      const ids = await deps.source.search(query, options);
      logger.debug(`[Search Handler] Found ${ids.length} ids`);

      if (ids.length === 0) {
        sendEvent(
          completeEvent.with({
            success: true,
            query,
            idsFound: 0,
            articles: [],
            stats: { ...EMPTY_STATS },
          }),
        );
        return;
      }

      sendEvent(fetchEvent.with({ query, ids }));
    } catch (error) {
      logger.error(`[Search Handler] Error: ${messageOf(error)}`);
      sendEvent(errorEvent.with({ stage: "search", error: messageOf(error), query }));
    }
  });

  workflow.handle([fetchEvent], async (context, event) => {
    const { sendEvent } = context;
    const { query, ids } = event.data;

    logger.debug(`[Fetch Handler] Fetching ${ids.length} records...`);

    try {
      const records = await deps.source.fetchRecords(ids);
      logger.debug(`[Fetch Handler] Received ${records.length} records`);

      sendEvent(extractEvent.with({ query, ids, records }));
    } catch (error) {
      logger.error(`[Fetch Handler] Error: ${messageOf(error)}`);
      sendEvent(errorEvent.with({ stage: "fetch", error: messageOf(error), query }));
    }
  });

  workflow.handle([extractEvent], async (context, event) => {
    const { sendEvent } = context;
    const { query, ids, records } = event.data;

    try {
      const { articles, stats } = aggregateArticles(records, {
        classifier: deps.classifier,
        logger: logger.child("Extract"),
      });

      if (stats.skipped > 0) {
        logger.warn(`[Extract Handler] Skipped ${stats.skipped} malformed records`);
      }
      logger.debug(
        `[Extract Handler] ${articles.length} of ${stats.processed} articles have industry authors`,
      );

      sendEvent(
        reportEvent.with({ query, idsFound: ids.length, articles, stats }),
      );
    } catch (error) {
      logger.error(`[Extract Handler] Error: ${messageOf(error)}`);
      sendEvent(errorEvent.with({ stage: "extract", error: messageOf(error), query }));
    }
  });

  workflow.handle([reportEvent], async (context, event) => {
    const { sendEvent } = context;
    const { query, idsFound, articles, stats } = event.data;

    logger.debug(`[Report Handler] Writing ${articles.length} articles with ${deps.sink.name}`);

    try {
      const summary = await deps.sink.write(articles);

      sendEvent(
        completeEvent.with({
          success: true,
          query,
          idsFound,
          articles,
          stats,
          destination: summary.destination,
        }),
      );
    } catch (error) {
      logger.error(`[Report Handler] Error: ${messageOf(error)}`);
      sendEvent(errorEvent.with({ stage: "report", error: messageOf(error), query }));
    }
  });

  workflow.handle([errorEvent], async (context, event) => {
    const { stage, error, query } = event.data;
    logger.error(`[Error Handler] Pipeline failed at ${stage} stage for "${query}"`);

    context.sendEvent(
      completeEvent.with({
        success: false,
        query,
        idsFound: 0,
        articles: [],
        stats: { ...EMPTY_STATS },
        error: `${stage}: ${error}`,
      }),
    );
  });

  return workflow;
}

export type IndustryFilterWorkflow = ReturnType<typeof createIndustryFilterWorkflow>;

/**
 * Starts the workflow with a search and waits for its completion event.
 */
export async function runIndustryFilter(
  workflow: IndustryFilterWorkflow,
  query: string,
  options: SearchOptions = {},
): Promise<FilterOutcome> {
  const { stream, sendEvent } = workflow.createContext();
  sendEvent(searchEvent.with({ query, options }));

  for await (const event of stream) {
    if (completeEvent.include(event)) {
      return event.data;
    }
  }

  throw new Error("Workflow stream ended without a completion event");
}
