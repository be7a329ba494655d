import type { Article } from "../types/domain.js";

export const REPORT_COLUMNS = [
    "PubmedID",
    "Title",
    "Publication Date",
    "DOI",
    "Non-academic Author(s)",
    "Company Affiliation(s)",
    "Corresponding Author Email",
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];
export type ReportRow = Record<ReportColumn, string>;

const LIST_SEPARATOR = "; ";

export function toReportRow(article: Article): ReportRow {
    const names = article.industryAuthors.map((author) => author.name);
    const affiliations = new Set(
        article.industryAuthors.map((author) => author.affiliation).filter((affiliation) => affiliation !== ""),
    );

    return {
        PubmedID: article.sourceId,
        Title: article.title,
        "Publication Date": article.publicationDate,
        DOI: article.doi,
        "Non-academic Author(s)": names.join(LIST_SEPARATOR),
        "Company Affiliation(s)": [...affiliations].join(LIST_SEPARATOR),
        "Corresponding Author Email": article.correspondingEmails.join(LIST_SEPARATOR),
    };
}

export function escapeCsv(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/** Header line plus one line per article, CRLF-terminated. */
export function formatCsv(articles: readonly Article[]): string {
    const lines = [REPORT_COLUMNS.map(escapeCsv).join(",")];
    for (const article of articles) {
        const row = toReportRow(article);
        lines.push(REPORT_COLUMNS.map((column) => escapeCsv(row[column])).join(","));
    }
    return lines.map((line) => `${line}\r\n`).join("");
}
