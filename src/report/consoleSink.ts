import type { Article } from "../types/domain.js";
import type { IReportSink, ReportSummary } from "../types/interfaces/pipeline.js";

const RULE_WIDTH = 80;

export function formatListing(articles: readonly Article[]): string[] {
    const lines = [
        "",
        "=".repeat(RULE_WIDTH),
        `FOUND ${articles.length} PAPERS WITH INDUSTRY AFFILIATIONS`,
        "=".repeat(RULE_WIDTH),
    ];

    articles.forEach((article, i) => {
        lines.push(
            "",
            `${i + 1}. ${article.title}`,
            `   PMID: ${article.sourceId}`,
            `   Published: ${article.publicationDate}`,
            `   DOI: ${article.doi || "N/A"}`,
            "   Industry Authors:",
        );
        for (const author of article.industryAuthors) {
            lines.push(`     - ${author.name}${author.email ? ` (${author.email})` : ""}`);
            if (author.affiliation) {
                lines.push(`       ${author.affiliation}`);
            }
        }
        lines.push("-".repeat(RULE_WIDTH));
    });

    return lines;
}

export class ConsoleReportSink implements IReportSink {
    name = "ConsoleReportSink";

    constructor(private print: (line: string) => void = (line) => console.log(line)) {}

    async write(articles: readonly Article[]): Promise<ReportSummary> {
        if (articles.length === 0) {
            return { articlesWritten: 0 };
        }
        for (const line of formatListing(articles)) {
            this.print(line);
        }
        return { articlesWritten: articles.length };
    }
}
