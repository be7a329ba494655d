import "dotenv/config";
import { z } from "zod";

/**
 * Centralized configuration module
 * Single source of truth for environment variables and defaults
 */

const EnvSchema = z.object({
    NCBI_EMAIL: z.string().email().optional(),
    NCBI_API_KEY: z.string().min(1).optional(),
    NCBI_TOOL: z.string().min(1).default("industry-affiliation-filter"),
    NCBI_BASE_URL: z.string().url().default("https://eutils.ncbi.nlm.nih.gov/entrez/eutils"),
    PUBMED_FETCH_BATCH_SIZE: z.coerce.number().int().positive().max(10000).default(200),
    PUBMED_DEBUG: z
        .string()
        .optional()
        .transform((value) => value === "true" || value === "1"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Validates environment variables against the schema
 * @throws Error naming every invalid variable
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    // Blank entries (KEY= in .env) count as unset
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
    );
    const result = EnvSchema.safeParse(present);
    if (!result.success) {
        const invalid = result.error.issues.map((issue) => issue.path.join("."));
        throw new Error(`Invalid environment variables: ${[...new Set(invalid)].join(", ")}`);
    }
    return result.data;
}

export function buildConfig(env: EnvConfig) {
    return {
        ncbi: {
            email: env.NCBI_EMAIL,
            apiKey: env.NCBI_API_KEY,
            tool: env.NCBI_TOOL,
            baseUrl: env.NCBI_BASE_URL,
        },
        search: {
            defaultMaxResults: 20,
            maxResultsCap: 100000,
            fetchBatchSize: env.PUBMED_FETCH_BATCH_SIZE,
        },
        output: {
            defaultFile: "pubmed_industry_results.csv",
        },
        debug: env.PUBMED_DEBUG,
    } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return buildConfig(loadEnv(env));
}
