import { describe, it, expect } from 'vitest';
import {
    isVerbatimQuote,
    normalizeWhitespace,
    validateEvidenceQuotes
} from '../../../src/scoring/quote-validator';
import { EvidenceRequiredError } from '../../../src/errors/pipeline-errors';

const { makeMatch, makeEvidenceMap } = globalThis.testUtils;

const RESUME = 'I built Python APIs with FastAPI';
const JD_QUOTE = 'Strong Python experience required';

describe('Quote Validator', () => {
    it('normalizeWhitespace should collapse runs and trim', () => {
        expect(normalizeWhitespace('  Built\tdata \n\n pipelines  ')).toBe('Built data pipelines');
    });

    it('isVerbatimQuote should enforce the minimum length', () => {
        const resume = normalizeWhitespace(RESUME);
        expect(isVerbatimQuote('Python', resume, 12)).toBe(false);
        expect(isVerbatimQuote('Python APIs with', resume, 12)).toBe(true);
    });

    it('should keep a present quote and demote a quote copied from the JD', () => {
        const input = makeEvidenceMap([
            makeMatch({ requirement_id: 'REQ-aaaaaaaaaa', matched: true, evidence: [{ quote: 'Python APIs with FastAPI' }] }),
            makeMatch({ requirement_id: 'REQ-bbbbbbbbbb', matched: true, evidence: [{ quote: JD_QUOTE }] })
        ]);

        const result = validateEvidenceQuotes(RESUME, input);

        expect(result.matches[0]).toEqual(makeMatch({
            requirement_id: 'REQ-aaaaaaaaaa',
            matched: true,
            evidence: [{ quote: 'Python APIs with FastAPI' }],
            invalid_quote: false
        }));
        expect(result.matches[1]).toEqual(makeMatch({
            requirement_id: 'REQ-bbbbbbbbbb',
            matched: false,
            evidence: [],
            invalid_quote: true
        }));
        expect(result.meta).toEqual({
            matched_count_raw: 2,
            matched_count_validated: 1,
            invalid_quote_count: 1,
            evidence_prompt_includes_description: false
        });
    });

    it('should accept quotes that differ only in whitespace', () => {
        const resume = 'Built data pipelines\n   in Python and SQL';
        const input = makeEvidenceMap([
            makeMatch({ matched: true, evidence: [{ quote: 'Built data   pipelines in\nPython' }] })
        ]);

        const result = validateEvidenceQuotes(resume, input);

        expect(result.matches[0].matched).toBe(true);
        expect(result.matches[0].invalid_quote).toBe(false);
    });

    it('should demote a quote shorter than the minimum length', () => {
        const input = makeEvidenceMap([
            makeMatch({ matched: true, evidence: [{ quote: 'Python' }] })
        ]);

        expect(validateEvidenceQuotes(RESUME, input).matches[0].invalid_quote).toBe(true);
        expect(validateEvidenceQuotes(RESUME, input, 5).matches[0].matched).toBe(true);
    });

    it('should demote the whole match when one of its quotes is invalid', () => {
        const input = makeEvidenceMap([
            makeMatch({
                matched: true,
                evidence: [{ quote: 'Python APIs with FastAPI' }, { quote: JD_QUOTE }]
            })
        ]);

        const [match] = validateEvidenceQuotes(RESUME, input).matches;

        expect(match.matched).toBe(false);
        expect(match.evidence).toEqual([]);
    });

    it('should reject a positive match without a quote', () => {
        const noEvidence = makeEvidenceMap([makeMatch({ requirement_id: 'REQ-cccccccccc', matched: true, evidence: [] })]);
        const emptyQuote = makeEvidenceMap([makeMatch({ matched: true, evidence: [{ quote: '' }] })]);

        expect(() => validateEvidenceQuotes(RESUME, noEvidence)).toThrow(EvidenceRequiredError);
        expect(() => validateEvidenceQuotes(RESUME, noEvidence))
            .toThrow('Requirement REQ-cccccccccc has matched=true but no evidence quote');
        expect(() => validateEvidenceQuotes(RESUME, emptyQuote)).toThrow(EvidenceRequiredError);
    });

    it('should leave unmatched entries alone', () => {
        const input = makeEvidenceMap([makeMatch({ matched: false, notes: 'not mentioned' })]);

        const result = validateEvidenceQuotes(RESUME, input);

        expect(result.matches).toEqual(input.matches);
        expect(result.meta.matched_count_raw).toBe(0);
    });

    it('should not mutate its input', () => {
        const input = makeEvidenceMap([
            makeMatch({ matched: true, evidence: [{ quote: JD_QUOTE }] })
        ]);
        const before = structuredClone(input);

        const result = validateEvidenceQuotes(RESUME, input);

        expect(input).toEqual(before);
        expect(result).not.toBe(input);
        expect(result.matches[0]).not.toBe(input.matches[0]);
    });

    it('should reset a stale invalid_quote flag on an unmatched entry', () => {
        const input = makeEvidenceMap([
            makeMatch({ matched: false, evidence: [], invalid_quote: true, notes: 'demoted earlier' })
        ]);

        const result = validateEvidenceQuotes(RESUME, input);

        expect(result.matches[0]).toEqual(makeMatch({ matched: false, evidence: [], invalid_quote: false, notes: 'demoted earlier' }));
        expect(result.meta.invalid_quote_count).toBe(0);
    });

    it('should count only the demotions made by the current call', () => {
        const input = makeEvidenceMap([
            makeMatch({ requirement_id: 'REQ-aaaaaaaaaa', matched: true, evidence: [{ quote: 'Python APIs with FastAPI' }] }),
            makeMatch({ requirement_id: 'REQ-bbbbbbbbbb', matched: true, evidence: [{ quote: JD_QUOTE }] })
        ]);

        const once = validateEvidenceQuotes(RESUME, input);
        const twice = validateEvidenceQuotes(RESUME, once);

        expect(once.meta.invalid_quote_count).toBe(1);
        expect(twice.meta.invalid_quote_count).toBe(0);
        expect(twice.meta.matched_count_validated).toBe(1);
        expect(twice.matches[1]).toEqual(makeMatch({
            requirement_id: 'REQ-bbbbbbbbbb',
            matched: false,
            evidence: [],
            invalid_quote: false
        }));
    });
});
