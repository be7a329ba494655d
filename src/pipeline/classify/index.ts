import type { AffiliationClass } from "../../types/domain.js";
import { DEFAULT_KEYWORDS, type KeywordTable } from "./keywords.js";

export { DEFAULT_KEYWORDS, type KeywordTable } from "./keywords.js";

export interface AffiliationMatch {
    affiliationClass: AffiliationClass;
    /** Keyword that decided the class; null when nothing matched. */
    keyword: string | null;
}

export interface AffiliationClassifier {
    classify(affiliation: string | null | undefined): AffiliationClass;
    explain(affiliation: string | null | undefined): AffiliationMatch;
}

// First class whose keyword matches wins.
const CLASS_PRIORITY: readonly AffiliationClass[] = ["academic", "industry"];
const FALLBACK_CLASS: AffiliationClass = "academic";

/**
 * Builds a keyword classifier over the given table.
 * Matching is a case-insensitive substring test, not a word-boundary one,
 * so short terms such as "ag" also match inside longer words.
 */
export function createAffiliationClassifier(
    table: KeywordTable = DEFAULT_KEYWORDS,
): AffiliationClassifier {
    const terms = CLASS_PRIORITY.map((affiliationClass) => ({
        affiliationClass,
        keywords: table[affiliationClass].map((k) => k.toLowerCase()),
    }));

    function explain(affiliation: string | null | undefined): AffiliationMatch {
        if (!affiliation) {
            return { affiliationClass: FALLBACK_CLASS, keyword: null };
        }

        const text = affiliation.toLowerCase();
        for (const { affiliationClass, keywords } of terms) {
            const keyword = keywords.find((k) => text.includes(k));
            if (keyword !== undefined) {
                return { affiliationClass, keyword };
            }
        }

        return { affiliationClass: FALLBACK_CLASS, keyword: null };
    }

    return {
        explain,
        classify: (affiliation) => explain(affiliation).affiliationClass,
    };
}

export const defaultClassifier = createAffiliationClassifier();

export function classifyAffiliation(affiliation: string | null | undefined): AffiliationClass {
    return defaultClassifier.classify(affiliation);
}

export function explainAffiliation(affiliation: string | null | undefined): AffiliationMatch {
    return defaultClassifier.explain(affiliation);
}

export function isIndustryAffiliation(affiliation: string | null | undefined): boolean {
    return classifyAffiliation(affiliation) === "industry";
}
