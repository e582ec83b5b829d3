/**
 * Relevance Filter
 *
 * Tags text as relevant to the configured domain with a lexical heuristic:
 * count how many vocabulary terms (topics plus keywords) appear in the text
 * and call it relevant when at least two do.
 *
 * This is a tag, not a gate. Ingestion indexes every chunk whatever the tag
 * says; the flag travels with the record as metadata.
 */

import { DomainVocabulary } from '../config';

/** Minimum number of distinct vocabulary hits for a relevant text */
export const RELEVANCE_THRESHOLD = 2;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a term into a whole-word matcher.
 * Short terms like "am" or "rf" would otherwise match inside ordinary words.
 */
function compileTerm(term: string): RegExp {
    const words = term.trim().toLowerCase().split(/\s+/).map(escapeRegExp);
    return new RegExp(`(?<![a-z0-9])${words.join('\\s+')}(?![a-z0-9])`);
}

export class RelevanceFilter {
    private readonly matchers: RegExp[];

    constructor(vocabulary: DomainVocabulary) {
        const terms = new Set<string>();
        for (const term of [...vocabulary.topics, ...vocabulary.keywords]) {
            const normalized = term.trim().toLowerCase();
            if (normalized) {
                terms.add(normalized);
            }
        }
        this.matchers = Array.from(terms, compileTerm);
    }

    /**
     * Number of distinct vocabulary terms present in the text.
     */
    countMatches(text: string): number {
        const lower = text.toLowerCase();
        let matches = 0;
        for (const matcher of this.matchers) {
            if (matcher.test(lower)) {
                matches++;
            }
        }
        return matches;
    }

    isDomainRelevant(text: string): boolean {
        return this.countMatches(text) >= RELEVANCE_THRESHOLD;
    }
}

export function createRelevanceFilter(vocabulary: DomainVocabulary): RelevanceFilter {
    return new RelevanceFilter(vocabulary);
}
