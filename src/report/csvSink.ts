import * as fs from "fs/promises";
import * as path from "path";
import type { Article } from "../types/domain.js";
import type { IReportSink, ReportSummary } from "../types/interfaces/pipeline.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { formatCsv } from "./rows.js";

export class CsvReportSink implements IReportSink {
    name = "CsvReportSink";
    private filePath: string;

    constructor(
        filePath: string,
        private logger: Logger = silentLogger,
    ) {
        this.filePath = path.resolve(filePath);
    }

    async write(articles: readonly Article[]): Promise<ReportSummary> {
        if (articles.length === 0) {
            this.logger.debug("No articles to save to CSV");
            return { articlesWritten: 0 };
        }

        this.logger.debug(`Saving ${articles.length} articles to ${this.filePath}`);
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, formatCsv(articles), "utf-8");

        return { articlesWritten: articles.length, destination: this.filePath };
    }
}
