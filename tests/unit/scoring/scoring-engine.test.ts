import { describe, it, expect } from 'vitest';
import {
    computeScore,
    percentage,
    roundToTenth,
    validateEvidenceMap
} from '../../../src/scoring/scoring-engine';
import { EvidenceRequiredError } from '../../../src/errors/pipeline-errors';

const { makeRequirement, makeDocument, makeMatch, makeEvidenceMap } = globalThis.testUtils;

const RESUME = 'I built Python APIs with FastAPI';

const python = makeRequirement({ id: 'REQ-aaaaaaaaaa', requirement_key: 'python', name: 'Python' });
const fastapi = makeRequirement({ id: 'REQ-bbbbbbbbbb', requirement_key: 'fastapi', name: 'FastAPI' });

describe('Scoring Engine', () => {
    describe('roundToTenth', () => {
        it('should send an exact half to the even tenth', () => {
            expect(roundToTenth(6.25)).toBe(6.2);
            expect(roundToTenth(31.25)).toBe(31.2);
            expect(roundToTenth(18.75)).toBe(18.8);
            expect(roundToTenth(-2.25)).toBe(-2.2);
        });

        it('should round values off the half by their exact binary value', () => {
            expect(roundToTenth(0.15)).toBe(0.1);
            expect(roundToTenth(1.35)).toBe(1.4);
            expect(roundToTenth(33.333)).toBe(33.3);
            expect(roundToTenth(0)).toBe(0);
        });

        it('percentage should round to one decimal', () => {
            expect(percentage(1, 3)).toBe(33.3);
            expect(percentage(2, 3)).toBe(66.7);
            expect(percentage(3, 3)).toBe(100);
            expect(percentage(1, 16)).toBe(6.2);
            expect(percentage(5, 16)).toBe(31.2);
            expect(percentage(3, 16)).toBe(18.8);
            expect(percentage(1, 80)).toBe(1.2);
        });
    });

    describe('computeScore', () => {
        it('should be deterministic', () => {
            const document = makeDocument([python, fastapi]);
            const evidenceMap = makeEvidenceMap([
                makeMatch({ requirement_id: python.id, matched: true, evidence: [{ quote: 'Python APIs with FastAPI' }] }),
                makeMatch({ requirement_id: fastapi.id, matched: false })
            ]);

            const first = computeScore(document, evidenceMap, { resumeText: RESUME });
            for (let run = 0; run < 5; run++) {
                const next = computeScore(document, evidenceMap, { resumeText: RESUME });
                expect(JSON.stringify(next)).toBe(JSON.stringify(first));
            }
        });

        it('should refuse a positive match with no evidence', () => {
            const document = makeDocument([python]);
            const evidenceMap = makeEvidenceMap([
                makeMatch({ requirement_id: python.id, matched: true, evidence: [] })
            ]);

            expect(() => computeScore(document, evidenceMap)).toThrow(EvidenceRequiredError);
            expect(() => computeScore(document, evidenceMap, { resumeText: RESUME })).toThrow(EvidenceRequiredError);
        });

        it('should score a positive match with one valid quote as matched', () => {
            const document = makeDocument([python]);
            const evidenceMap = makeEvidenceMap([
                makeMatch({ requirement_id: python.id, matched: true, evidence: [{ quote: 'built Python APIs' }] })
            ]);

            const score = computeScore(document, evidenceMap, { resumeText: RESUME });

            expect(score.total_matched).toBe(1);
            expect(score.must_have_coverage).toBe(100);
            expect(score.overall_score).toBe(100);
        });

        it('should drop from 100 to 50 when a JD quote is caught', () => {
            const document = makeDocument([python, fastapi]);
            const evidenceMap = makeEvidenceMap([
                makeMatch({ requirement_id: python.id, matched: true, evidence: [{ quote: 'Python APIs with FastAPI' }] }),
                makeMatch({ requirement_id: fastapi.id, matched: true, evidence: [{ quote: 'Strong Python experience required' }] })
            ]);

            expect(computeScore(document, evidenceMap).overall_score).toBe(100);

            const validated = computeScore(document, evidenceMap, { resumeText: RESUME });
            expect(validated.overall_score).toBe(50);
            expect(validated.must_have_coverage).toBe(50);
            expect(validated.must_have_matched).toBe(1);
        });

        it('should report 100 coverage for an empty nice-to-have partition', () => {
            const document = makeDocument([python]);
            const evidenceMap = makeEvidenceMap([makeMatch({ requirement_id: python.id })]);

            const score = computeScore(document, evidenceMap);

            expect(score.nice_to_have_coverage).toBe(100);
            expect(score.nice_to_have_total).toBe(0);
            expect(score.must_have_coverage).toBe(0);
        });

        it('should score an empty document as 0 overall with vacuous coverage', () => {
            const score = computeScore(makeDocument([]), makeEvidenceMap([]));

            expect(score).toEqual({
                must_have_coverage: 100,
                nice_to_have_coverage: 100,
                must_have_matched: 0,
                must_have_total: 0,
                nice_to_have_matched: 0,
                nice_to_have_total: 0,
                per_category_scores: {},
                overall_score: 0,
                total_matched: 0,
                total_requirements: 0
            });
        });

        it('should round an exact-half coverage to the even tenth', () => {
            const requirements = Array.from({ length: 16 }, (_, index) => makeRequirement({
                id: `REQ-${String(index).padStart(10, '0')}`,
                requirement_key: `skill_${index}`,
                name: `Skill ${index}`
            }));
            const evidenceMap = makeEvidenceMap(requirements.map((requirement, index) => makeMatch({
                requirement_id: requirement.id,
                requirement_key: requirement.requirement_key,
                matched: index === 0,
                evidence: index === 0 ? [{ quote: 'built Python APIs' }] : []
            })));

            const score = computeScore(makeDocument(requirements), evidenceMap, { resumeText: RESUME });

            expect(score.must_have_coverage).toBe(6.2);
            expect(score.overall_score).toBe(6.2);
        });

        it('should break scores down per category in first-appearance order', () => {
            const llm = makeRequirement({ id: 'REQ-1111111111', requirement_key: 'llm', name: 'LLM', category: 'AI' });
            const sql = makeRequirement({ id: 'REQ-2222222222', requirement_key: 'sql', name: 'SQL' });
            const go = makeRequirement({ id: 'REQ-3333333333', requirement_key: 'go', name: 'Go', must_have: false });
            const document = makeDocument([llm, sql, go]);
            const evidenceMap = makeEvidenceMap([
                makeMatch({ requirement_id: llm.id, matched: true, evidence: [{ quote: 'fine-tuned an LLM' }] }),
                makeMatch({ requirement_id: go.id, matched: true, evidence: [{ quote: 'wrote Go services' }] }),
                makeMatch({ requirement_id: 'REQ-ffffffffff', matched: true, evidence: [{ quote: 'unrelated entry' }] })
            ]);

            const score = computeScore(document, evidenceMap);

            expect(Object.keys(score.per_category_scores)).toEqual(['AI', 'Technical']);
            expect(score.per_category_scores).toEqual({
                AI: { matched: 1, total: 1, pct: 100 },
                Technical: { matched: 1, total: 2, pct: 50 }
            });
            expect(score.must_have_coverage).toBe(50);
            expect(score.nice_to_have_coverage).toBe(100);
            expect(score.overall_score).toBe(66.7);
            expect(score.total_matched).toBe(2);
        });
    });

    describe('validateEvidenceMap', () => {
        it('should return the map unchanged without a résumé', () => {
            const evidenceMap = makeEvidenceMap([makeMatch({ matched: true, evidence: [{ quote: 'anything goes' }] })]);
            expect(validateEvidenceMap(evidenceMap)).toBe(evidenceMap);
        });

        it('should re-validate quotes when given a résumé', () => {
            const evidenceMap = makeEvidenceMap([makeMatch({ matched: true, evidence: [{ quote: 'not in the résumé' }] })]);

            const checked = validateEvidenceMap(evidenceMap, { resumeText: RESUME });

            expect(checked.matches[0].matched).toBe(false);
            expect(checked.matches[0].invalid_quote).toBe(true);
        });
    });
});
