import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { IArticleSource, SearchOptions } from "../types/interfaces/pipeline.js";
import type { RawPubmedArticle } from "../types/zodSchemas.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { withRetry, type RetryOptions } from "../utils/resilience.js";
import { parsePubmedArticleSet } from "./pubmedXml.js";

export class PubMedApiError extends Error {
    constructor(
        message: string,
        readonly status?: number,
    ) {
        super(message);
        this.name = "PubMedApiError";
    }
}

export interface PubMedClientOptions {
    baseUrl: string;
    tool: string;
    email?: string | undefined;
    apiKey?: string | undefined;
    maxResultsCap?: number;
    fetchBatchSize?: number;
    http?: AxiosInstance;
    retry?: Omit<RetryOptions, "name">;
    logger?: Logger;
}

const ESearchResponseSchema = z.object({
    error: z.string().optional(),
    esearchresult: z
        .object({
            idlist: z.array(z.string()).default([]),
            ERROR: z.string().optional(),
        })
        .optional(),
});

/**
 * NCBI E-utilities client: esearch for PMIDs, efetch for the records.
 */
export class PubMedClient implements IArticleSource {
    name = "PubMedClient";
    private http: AxiosInstance;
    private logger: Logger;
    private maxResultsCap: number;
    private fetchBatchSize: number;

    constructor(private options: PubMedClientOptions) {
        this.http = options.http ?? axios.create({ timeout: 30000 });
        this.logger = options.logger ?? silentLogger;
        this.maxResultsCap = options.maxResultsCap ?? 100000;
        this.fetchBatchSize = options.fetchBatchSize ?? 200;
    }

    private commonParams() {
        return {
            db: "pubmed",
            tool: this.options.tool,
            email: this.options.email,
            api_key: this.options.apiKey,
        };
    }

    private toApiError(error: unknown, action: string): PubMedApiError {
        if (error instanceof PubMedApiError) return error;
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            return new PubMedApiError(
                `${action} failed: ${status ? `HTTP ${status}` : error.message}`,
                status,
            );
        }
        return new PubMedApiError(`${action} failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    async search(query: string, options: SearchOptions = {}): Promise<string[]> {
        const retmax = Math.min(options.maxResults ?? 20, this.maxResultsCap);
        this.logger.debug(`Searching PubMed for: ${query} (retmax ${retmax})`);

        const params = {
            ...this.commonParams(),
            term: query,
            retmax,
            retstart: options.retStart ?? 0,
            retmode: "json",
            sort: "relevance",
            datetype: "pdat",
            mindate: options.minDate,
            maxdate: options.maxDate,
        };

        let data: unknown;
        try {
            const response = await withRetry(
                () => this.http.get<unknown>(`${this.options.baseUrl}/esearch.fcgi`, { params }),
                { logger: this.logger, ...this.options.retry, name: "PubMed.esearch" },
            );
            data = response.data;
        } catch (error) {
            throw this.toApiError(error, "PubMed search");
        }

        const parsed = ESearchResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new PubMedApiError("Failed to parse PubMed search response");
        }

        const apiError = parsed.data.error ?? parsed.data.esearchresult?.ERROR;
        if (apiError) {
            throw new PubMedApiError(`PubMed API error: ${apiError}`);
        }

        const ids = parsed.data.esearchresult?.idlist ?? [];
        this.logger.debug(`esearch returned ${ids.length} ids`);
        return ids;
    }

    async fetchRecords(ids: readonly string[]): Promise<RawPubmedArticle[]> {
        const records: RawPubmedArticle[] = [];

        for (let start = 0; start < ids.length; start += this.fetchBatchSize) {
            const batch = ids.slice(start, start + this.fetchBatchSize);
            this.logger.debug(`Fetching records ${start + 1}-${start + batch.length} of ${ids.length}`);

            let xml: string;
            try {
                const response = await withRetry(
                    () =>
                        this.http.get<string>(`${this.options.baseUrl}/efetch.fcgi`, {
                            params: { ...this.commonParams(), id: batch.join(","), retmode: "xml" },
                            responseType: "text",
                        }),
                    { logger: this.logger, ...this.options.retry, name: "PubMed.efetch" },
                );
                xml = response.data;
            } catch (error) {
                throw this.toApiError(error, "PubMed fetch");
            }

            records.push(...parsePubmedArticleSet(xml));
        }

        return orderByIds(records, ids);
    }
}

/**
 * Puts records in the order of `ids`.
 * Records whose PMID is not in the list keep their relative order at the end.
 * A repeated id yields its record once.
 */
export function orderByIds(records: readonly RawPubmedArticle[], ids: readonly string[]): RawPubmedArticle[] {
    const byId = new Map<string, RawPubmedArticle>();
    const unmatched: RawPubmedArticle[] = [];
    const wanted = new Set(ids);

    for (const record of records) {
        const pmid = record.MedlineCitation?.PMID;
        if (pmid != null && wanted.has(pmid) && !byId.has(pmid)) {
            byId.set(pmid, record);
        } else {
            unmatched.push(record);
        }
    }

    const ordered: RawPubmedArticle[] = [];
    for (const id of ids) {
        const record = byId.get(id);
        if (record) {
            ordered.push(record);
            byId.delete(id);
        }
    }
    return [...ordered, ...unmatched];
}
