import { DEFAULT_MIN_QUOTE_LENGTH } from '../config/pipeline-config';
import { EvidenceRequiredError } from '../errors/pipeline-errors';
import { EvidenceMap, Match, ValidationMeta } from '../types/evidence';

/**
 * Quote Validator
 *
 * A positive match survives only if every quote it cites appears verbatim
 * in the résumé, modulo whitespace. One bad quote demotes the whole match.
 */

/**
 * Collapse every whitespace run (spaces, tabs, newlines) to one space and trim.
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export function hasQuotedEvidence(match: Pick<Match, 'evidence'>): boolean {
    return match.evidence.some(item => item.quote.length > 0);
}

export function isVerbatimQuote(quote: string, normalizedResume: string, minLength: number): boolean {
    const normalizedQuote = normalizeWhitespace(quote);
    return normalizedQuote.length >= minLength && normalizedResume.includes(normalizedQuote);
}

function validateMatch(match: Match, normalizedResume: string, minLength: number): Match {
    if (match.matched !== true) {
        return { ...match, invalid_quote: false };
    }

    const quotes = match.evidence.map(item => item.quote).filter(quote => quote.length > 0);
    if (quotes.length === 0) {
        throw new EvidenceRequiredError(match.requirement_id);
    }

    if (quotes.every(quote => isVerbatimQuote(quote, normalizedResume, minLength))) {
        return { ...match, invalid_quote: false };
    }

    return { ...match, matched: false, evidence: [], invalid_quote: true };
}

/**
 * Validate every positive match of `evidenceMap` against `resumeText`.
 * Returns a new map with demoted matches and fresh validation counters;
 * the input is left untouched.
 */
export function validateEvidenceQuotes(
    resumeText: string,
    evidenceMap: EvidenceMap,
    minLength: number = DEFAULT_MIN_QUOTE_LENGTH
): EvidenceMap {
    const normalizedResume = normalizeWhitespace(resumeText);
    const matches = evidenceMap.matches.map(match => validateMatch(match, normalizedResume, minLength));

    const meta: ValidationMeta = {
        matched_count_raw: evidenceMap.matches.filter(match => match.matched === true).length,
        matched_count_validated: matches.filter(match => match.matched === true).length,
        invalid_quote_count: matches.filter(match => match.invalid_quote).length,
        evidence_prompt_includes_description: false
    };

    return { ...evidenceMap, matches, meta };
}
