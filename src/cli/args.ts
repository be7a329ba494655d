import { z } from "zod";

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CliUsageError";
    }
}

const DATE_PATTERN = /^\d{4}(\/\d{1,2}(\/\d{1,2})?)?$/;
const DATE_HINT = "Use YYYY, YYYY/MM, or YYYY/MM/DD";

export const CliOptionsSchema = z.object({
    query: z.string().min(1),
    maxResults: z.number().int().positive("Maximum results must be a positive integer"),
    output: z.string().min(1),
    noFile: z.boolean(),
    debug: z.boolean(),
    apiKey: z.string().min(1).optional(),
    minDate: z.string().regex(DATE_PATTERN, `Invalid mindate format. ${DATE_HINT}`).optional(),
    maxDate: z.string().regex(DATE_PATTERN, `Invalid maxdate format. ${DATE_HINT}`).optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type CliCommand = { kind: "help" } | { kind: "run"; options: CliOptions };

export interface CliDefaults {
    maxResults: number;
    output: string;
}

type ValueFlag = "maxResults" | "output" | "apiKey" | "minDate" | "maxDate";

const VALUE_FLAGS: Record<string, ValueFlag> = {
    "-n": "maxResults",
    "--max-results": "maxResults",
    "-o": "output",
    "--output": "output",
    "--api-key": "apiKey",
    "--mindate": "minDate",
    "--maxdate": "maxDate",
};

function parseInteger(flag: string, value: string): number {
    if (!/^-?\d+$/.test(value)) {
        throw new CliUsageError(`argument ${flag}: invalid int value: '${value}'`);
    }
    return Number.parseInt(value, 10);
}

/**
 * Parses command-line arguments (without the node and script entries).
 * A missing query or -h/--help yields the help command.
 */
export function parseCliArgs(argv: readonly string[], defaults: CliDefaults): CliCommand {
    if (argv.includes("-h") || argv.includes("--help")) {
        return { kind: "help" };
    }

    const values: Partial<Record<ValueFlag, string>> = {};
    const positional: string[] = [];
    let noFile = false;
    let debug = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? "";

        if (arg === "--no-file") {
            noFile = true;
            continue;
        }
        if (arg === "-d" || arg === "--debug") {
            debug = true;
            continue;
        }

        const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
        const flag = eq > 0 ? arg.slice(0, eq) : arg;
        const target = VALUE_FLAGS[flag];

        if (target) {
            const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
            if (value === undefined) {
                throw new CliUsageError(`argument ${flag}: expected one argument`);
            }
            values[target] = value;
            continue;
        }

        if (arg.startsWith("-") && arg !== "-") {
            throw new CliUsageError(`unrecognized arguments: ${arg}`);
        }
        positional.push(arg);
    }

    if (positional.length > 1) {
        throw new CliUsageError(`unrecognized arguments: ${positional.slice(1).join(" ")}`);
    }
    const query = positional[0];
    if (!query) {
        return { kind: "help" };
    }

    const parsed = CliOptionsSchema.safeParse({
        query,
        maxResults:
            values.maxResults === undefined
                ? defaults.maxResults
                : parseInteger("-n/--max-results", values.maxResults),
        output: values.output ?? defaults.output,
        noFile,
        debug,
        apiKey: values.apiKey,
        minDate: values.minDate,
        maxDate: values.maxDate,
    });

    if (!parsed.success) {
        throw new CliUsageError(parsed.error.issues[0]?.message ?? "Invalid arguments");
    }
    return { kind: "run", options: parsed.data };
}

export const HELP_TEXT = `
PubMed Industry Affiliation Filter
---------------------------------

USAGE:
  pubmed-industry-filter "search query" [options]

SEARCH SYNTAX:
  Supports all PubMed query syntax including:
  - Field tags: "cancer[Title/Abstract]", "smith[Author]"
  - Boolean operators: AND, OR, NOT
  - Date ranges: "2020:2023[dp]", "2023/01/01:2023/12/31[dp]"
  - MeSH terms: "neoplasms[MeSH]"

OPTIONS:
  -h, --help           Show this help message and exit
  -n, --max-results N  Maximum number of results (default: 20, max: 100,000)
  -o, --output FILE    Output CSV file (default: pubmed_industry_results.csv)
  --no-file            Print to console instead of file
  -d, --debug          Enable debug output
  --api-key KEY        NCBI API key for higher rate limits

DATE FILTERING:
  --mindate DATE  Minimum publication date (YYYY, YYYY/MM, or YYYY/MM/DD)
  --maxdate DATE  Maximum publication date (YYYY, YYYY/MM, or YYYY/MM/DD)

EXAMPLES:
  pubmed-industry-filter "cancer treatment"
  pubmed-industry-filter "diabetes" -n 100 -o diabetes_results.csv
  pubmed-industry-filter "alzheimer" --mindate 2020 --maxdate 2023
  pubmed-industry-filter "covid" --no-file -d
`;
