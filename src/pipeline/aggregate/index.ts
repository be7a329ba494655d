import type {
    AggregateResult,
    AggregateStats,
    Article,
    SkippedRecord,
} from "../../types/domain.js";
import { defaultClassifier, type AffiliationClassifier } from "../classify/index.js";
import { tryExtractArticle } from "../extract/index.js";
import { silentLogger, type Logger } from "../../utils/logger.js";

export interface AggregateOptions {
    classifier?: AffiliationClassifier;
    logger?: Logger;
    /** Called once per malformed record, in input order. */
    onSkip?: (record: SkippedRecord) => void;
}

function logAffiliations(article: Article, classifier: AffiliationClassifier, logger: Logger) {
    for (const author of article.allAuthors) {
        const { affiliationClass, keyword } = classifier.explain(author.affiliation);
        logger.debug(
            `  ${author.name}: ${affiliationClass}${keyword ? ` (matched "${keyword}")` : ""}`,
        );
    }
}

/**
 * Runs the article extractor over a batch of raw records, in order.
 * Records that fail extraction are counted and reported, never thrown.
 */
export function aggregateArticles(
    rawArticles: Iterable<unknown>,
    options: AggregateOptions = {},
): AggregateResult {
    const classifier = options.classifier ?? defaultClassifier;
    const logger = options.logger ?? silentLogger;

    const articles: Article[] = [];
    const stats: AggregateStats = { processed: 0, included: 0, excluded: 0, skipped: 0 };

    let index = 0;
    for (const raw of rawArticles) {
        const result = tryExtractArticle(raw, classifier);
        stats.processed++;

        switch (result.status) {
            case "included":
                stats.included++;
                articles.push(result.article);
                logger.debug(
                    `Article ${result.article.sourceId}: ${result.article.industryAuthors.length}/${result.article.allAuthors.length} industry authors`,
                );
                logAffiliations(result.article, classifier, logger);
                break;
            case "excluded":
                stats.excluded++;
                logger.debug(`Article ${result.sourceId}: no industry authors`);
                break;
            case "skipped":
                stats.skipped++;
                logger.warn(`Skipping record #${index + 1} (${result.sourceId || "no PMID"}): ${result.reason}`);
                options.onSkip?.({ index, sourceId: result.sourceId, reason: result.reason });
                break;
        }
        index++;
    }

    logger.debug(
        `Processed ${stats.processed} records: ${stats.included} included, ${stats.excluded} excluded, ${stats.skipped} skipped`,
    );
    return { articles, stats };
}
