import type { Author } from "../../types/domain.js";
import type { RawAuthor } from "../../types/zodSchemas.js";

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

/** First email-shaped substring of the text, or null. */
export function findEmail(text: string): string | null {
    const match = EMAIL_PATTERN.exec(text);
    return match ? match[0] : null;
}

/**
 * Maps one raw author to an Author.
 * Returns null when the fore name or last name is missing.
 */
export function extractAuthor(raw: RawAuthor): Author | null {
    const { LastName: lastName, ForeName: foreName } = raw;
    if (lastName == null || foreName == null) {
        return null;
    }

    const affiliation = raw.AffiliationInfo?.[0]?.Affiliation ?? "";
    const isCorresponding =
        raw.ValidYN === "Y" || affiliation.toLowerCase().includes("corresponding");

    return Object.freeze({
        name: `${foreName} ${lastName}`,
        affiliation,
        email: affiliation ? findEmail(affiliation) : null,
        isCorresponding,
    });
}
