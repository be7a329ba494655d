import type { AffiliationClass } from "../../types/domain.js";

export type KeywordTable = Readonly<Record<AffiliationClass, readonly string[]>>;

/**
 * Lower-case substring terms per affiliation class.
 * Academic terms are checked before industry terms.
 */
export const DEFAULT_KEYWORDS: KeywordTable = {
    academic: [
        "university",
        "college",
        "institute",
        "academy",
        "school",
        "hospital",
        "clinic",
        "medical center",
        "research center",
        "université",
        "universita",
        "universidad",
        // Japanese "joint-stock company"; listed here, so it counts as academic
        "株式会社",
    ],
    industry: [
        "pharma",
        "pharmaceutical",
        "biotech",
        "biotechnology",
        "inc",
        "ltd",
        "llc",
        "plc",
        "corporation",
        "company",
        "gmbh",
        "ag",
        "sas",
        "sarl",
        "labs",
        "research",
        "healthcare",
        "pfizer",
        "novartis",
        "roche",
        "merck",
        "johnson & johnson",
        "gsk",
        "glaxosmithkline",
        "sanofi",
        "astrazeneca",
        "eli lilly",
    ],
};
