import { getConfig, type AppConfig } from "../config/index.js";
import { PubMedClient } from "../ingestion/pubmedClient.js";
import {
    createIndustryFilterWorkflow,
    runIndustryFilter,
} from "../pipeline/workflow/industryFilterWorkflow.js";
import { ConsoleReportSink, CsvReportSink } from "../report/index.js";
import type { IArticleSource, IReportSink } from "../types/interfaces/pipeline.js";
import { createLogger } from "../utils/logger.js";
import {
    CliUsageError,
    HELP_TEXT,
    parseCliArgs,
    type CliCommand,
    type CliOptions,
} from "./args.js";

export interface CliIO {
    env?: NodeJS.ProcessEnv;
    print?: (line: string) => void;
    printError?: (line: string) => void;
    /** Replaces the E-utilities client, e.g. with an in-memory source. */
    source?: IArticleSource;
}

function describeDateRange(options: CliOptions): string | null {
    const parts: string[] = [];
    if (options.minDate) parts.push(`from ${options.minDate}`);
    if (options.maxDate) parts.push(`to ${options.maxDate}`);
    return parts.length > 0 ? parts.join(" ") : null;
}

/**
 * Runs the command line and resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = {}): Promise<number> {
    const print = io.print ?? ((line: string) => console.log(line));
    const printError = io.printError ?? ((line: string) => console.error(line));

    let config: AppConfig;
    let command: CliCommand;
    try {
        config = getConfig(io.env);
        command = parseCliArgs(argv, {
            maxResults: config.search.defaultMaxResults,
            output: config.output.defaultFile,
        });
    } catch (error) {
        const prefix = error instanceof CliUsageError ? "Error" : "Configuration error";
        printError(`${prefix}: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }

    if (command.kind === "help") {
        print(HELP_TEXT);
        return 0;
    }

    const { options } = command;
    const logger = createLogger("IndustryFilter", { debug: options.debug || config.debug });

    const source =
        io.source ??
        new PubMedClient({
            baseUrl: config.ncbi.baseUrl,
            tool: config.ncbi.tool,
            email: config.ncbi.email,
            apiKey: options.apiKey ?? config.ncbi.apiKey,
            maxResultsCap: config.search.maxResultsCap,
            fetchBatchSize: config.search.fetchBatchSize,
            logger: logger.child("PubMed"),
        });
    const sink: IReportSink = options.noFile
        ? new ConsoleReportSink(print)
        : new CsvReportSink(options.output, logger.child("CSV"));

    print(`Searching PubMed for: ${options.query}`);
    const dateRange = describeDateRange(options);
    if (dateRange) print(`Date range: ${dateRange}`);
    print(`Processing up to ${Math.min(options.maxResults, config.search.maxResultsCap)} results...`);
    print("-".repeat(80));

    const workflow = createIndustryFilterWorkflow({ source, sink, logger });
    const outcome = await runIndustryFilter(workflow, options.query, {
        maxResults: options.maxResults,
        minDate: options.minDate,
        maxDate: options.maxDate,
    });

    if (!outcome.success) {
        printError(`\nAn error occurred: ${outcome.error ?? "unknown error"}`);
        return 1;
    }

    if (outcome.idsFound === 0) {
        print("No articles found matching your query.");
        return 0;
    }

    if (outcome.articles.length === 0) {
        print("\nNo papers with industry affiliations found.");
    } else if (outcome.destination) {
        print(`\nResults saved to: ${outcome.destination}`);
    }
    if (outcome.stats.skipped > 0) {
        print(`Skipped ${outcome.stats.skipped} records that could not be extracted.`);
    }
    print(`\nSearch complete. Found ${outcome.articles.length} articles with industry affiliations.`);
    return 0;
}
