import {
    DATE_NOT_AVAILABLE,
    NO_TITLE,
    type Article,
    type ArticleExtraction,
    type Author,
} from "../../types/domain.js";
import {
    RawPubmedArticleSchema,
    type RawArticleId,
    type RawPubDate,
} from "../../types/zodSchemas.js";
import { defaultClassifier, type AffiliationClassifier } from "../classify/index.js";
import { extractAuthor } from "./author.js";

export { extractAuthor, findEmail } from "./author.js";

export function formatTitle(fragments: readonly string[] | null | undefined): string {
    const title = (fragments ?? [])
        .map((fragment) => fragment.replace(/\s+/g, " ").trim())
        .filter((fragment) => fragment.length > 0)
        .join(" ");
    return title || NO_TITLE;
}

/**
 * Year, then month, then day; stops at the first missing part.
 */
export function formatPublicationDate(pubDate: RawPubDate | null | undefined): string {
    const parts: string[] = [];
    for (const part of [pubDate?.Year, pubDate?.Month, pubDate?.Day]) {
        if (!part) break;
        parts.push(part);
    }
    return parts.length > 0 ? parts.join("-") : DATE_NOT_AVAILABLE;
}

export function findDoi(ids: readonly RawArticleId[] | null | undefined): string {
    return ids?.find((id) => id.IdType === "doi")?.value ?? "";
}

export function collectCorrespondingEmails(authors: readonly Author[]): string[] {
    const emails = new Set<string>();
    for (const author of authors) {
        if (author.isCorresponding && author.email) {
            emails.add(author.email);
        }
    }
    return [...emails];
}

/** Best-effort PMID lookup on a record that failed validation. */
function peekSourceId(raw: unknown): string {
    if (typeof raw !== "object" || raw === null || !("MedlineCitation" in raw)) return "";
    const citation = raw.MedlineCitation;
    if (typeof citation !== "object" || citation === null || !("PMID" in citation)) return "";
    return typeof citation.PMID === "string" ? citation.PMID : "";
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Extracts one raw PubMed record.
 * Never throws: malformed records come back as `skipped`, records without an
 * industry-affiliated author as `excluded`.
 */
export function tryExtractArticle(
    raw: unknown,
    classifier: AffiliationClassifier = defaultClassifier,
): ArticleExtraction {
    const parsed = RawPubmedArticleSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        return { status: "skipped", sourceId: peekSourceId(raw), reason: `malformed record (${issues})` };
    }

    const citation = parsed.data.MedlineCitation;
    const sourceId = citation?.PMID ?? "";

    try {
        if (!citation) {
            return { status: "skipped", sourceId, reason: "missing MedlineCitation" };
        }
        const article = citation.Article;
        if (!article) {
            return { status: "skipped", sourceId, reason: "missing Article" };
        }

        const allAuthors = (article.AuthorList ?? [])
            .map(extractAuthor)
            .filter((author): author is Author => author !== null);

        const industryAuthors = allAuthors.filter(
            (author) => classifier.classify(author.affiliation) === "industry",
        );
        if (industryAuthors.length === 0) {
            return { status: "excluded", sourceId, reason: "no-industry-authors" };
        }

        return {
            status: "included",
            article: Object.freeze({
                sourceId,
                title: formatTitle(article.ArticleTitle),
                publicationDate: formatPublicationDate(article.Journal?.JournalIssue?.PubDate),
                doi: findDoi(parsed.data.PubmedData?.ArticleIdList),
                allAuthors: Object.freeze(allAuthors),
                industryAuthors: Object.freeze(industryAuthors),
                correspondingEmails: Object.freeze(collectCorrespondingEmails(allAuthors)),
            }),
        };
    } catch (error) {
        return { status: "skipped", sourceId, reason: describeError(error) };
    }
}

export function extractArticle(
    raw: unknown,
    classifier: AffiliationClassifier = defaultClassifier,
): Article | null {
    const result = tryExtractArticle(raw, classifier);
    return result.status === "included" ? result.article : null;
}
