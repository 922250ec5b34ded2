import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EvidenceMatcher, reconcileMatch, requirementsForPrompt } from '../../../src/pipeline/evidence-matcher';
import { loadPipelineConfig } from '../../../src/config/pipeline-config';
import { GenerationFailedError } from '../../../src/errors/pipeline-errors';
import { RetryUtil } from '../../../src/utils/retry.util';
import { hashText } from '../../../src/utils/hash.util';

const { makeRequirement, makeDocument } = globalThis.testUtils;

const mockOpenAI = {
    generateJsonCompletion: vi.fn()
};

const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
};

const TEMPLATE = '{{requirements_json}}\n---\n{{resume_text}}';
const RESUME = 'I built Python APIs with FastAPI';

const config = loadPipelineConfig({
    LLM_API_KEY: 'test-secret',
    LLM_RETRY_DELAY_MS: '0'
});

const python = makeRequirement({
    id: 'REQ-aaaaaaaaaa',
    requirement_key: 'python',
    name: 'Python',
    description: 'Strong Python experience required',
    aliases: ['py']
});
const fastapi = makeRequirement({
    id: 'REQ-bbbbbbbbbb',
    requirement_key: 'fastapi',
    name: 'FastAPI',
    description: 'Production FastAPI services'
});
const document = makeDocument([python, fastapi]);

describe('Evidence Matcher - Dependency Injection Tests', () => {
    let matcher: EvidenceMatcher;

    beforeEach(() => {
        vi.clearAllMocks();
        matcher = new EvidenceMatcher(
            mockOpenAI,
            RetryUtil,
            mockLogger,
            config,
            TEMPLATE,
            () => 'run-fixed'
        );
    });

    describe('requirementsForPrompt', () => {
        it('should expose only id, key, name and aliases', () => {
            expect(requirementsForPrompt([python])).toEqual([
                { id: 'REQ-aaaaaaaaaa', requirement_key: 'python', name: 'Python', aliases: ['py'] }
            ]);
        });
    });

    describe('reconcileMatch', () => {
        const byId = new Map([[python.id, python], [fastapi.id, fastapi]]);
        const byKey = new Map([[python.requirement_key, python], [fastapi.requirement_key, fastapi]]);

        it('should reconcile by requirement_key when the id is unknown', () => {
            const match = reconcileMatch(
                { requirement_id: 'REQ-made-up', requirement_key: 'fastapi', matched: true, evidence: ['built Python APIs'] },
                byId,
                byKey
            );

            expect(match).toEqual({
                requirement_id: 'REQ-bbbbbbbbbb',
                requirement_key: 'fastapi',
                matched: true,
                evidence: [{ quote: 'built Python APIs' }],
                notes: '',
                invalid_quote: false
            });
        });

        it('should only accept a literal true as matched and drop confidence', () => {
            const match = reconcileMatch(
                { requirement_id: python.id, matched: 'true', confidence: 0.99, notes: 42 },
                byId,
                byKey
            );

            expect(match.matched).toBe(false);
            expect(match.notes).toBe('');
            expect(match).not.toHaveProperty('confidence');
        });

        it('should pass unreconciled entries through', () => {
            const match = reconcileMatch({ requirement_id: ' REQ-zzzz ', matched: false }, byId, byKey);

            expect(match).toEqual({
                requirement_id: 'REQ-zzzz',
                matched: false,
                evidence: [],
                notes: '',
                invalid_quote: false
            });
        });

        it('should keep only well-formed evidence fields', () => {
            const match = reconcileMatch(
                {
                    requirement_id: python.id,
                    matched: false,
                    evidence: [
                        { quote: 'built Python APIs', resume_section: 'Summary', years_experience: 3 },
                        { quote: 'with FastAPI', years_experience: 'three' },
                        { resume_section: 'Skills', years_experience: null },
                        7
                    ]
                },
                byId,
                byKey
            );

            expect(match.evidence).toEqual([
                { quote: 'built Python APIs', resume_section: 'Summary', years_experience: 3 },
                { quote: 'with FastAPI' },
                { quote: '', resume_section: 'Skills', years_experience: null }
            ]);
        });
    });

    describe('match', () => {
        it('should send requirements without descriptions', async () => {
            mockOpenAI.generateJsonCompletion.mockResolvedValue(JSON.stringify({ matches: [] }));

            await matcher.match(RESUME, document);

            const [messages, options] = mockOpenAI.generateJsonCompletion.mock.calls[0];
            expect(messages).toEqual([{
                role: 'user',
                content: `${JSON.stringify(requirementsForPrompt([python, fastapi]))}\n---\n${RESUME}`
            }]);
            expect(messages[0].content).not.toContain('Strong Python experience required');
            expect(options).toEqual({ model: 'gpt-4o-mini', temperature: 0, topP: 1 });
        });

        it('should return a validated evidence map with audit metadata', async () => {
            mockOpenAI.generateJsonCompletion.mockResolvedValue(JSON.stringify({
                matches: [
                    {
                        requirement_id: 'REQ-aaaaaaaaaa',
                        matched: true,
                        evidence: [{ quote: 'Python APIs with FastAPI', resume_section: 'Summary' }],
                        notes: 'stated directly',
                        confidence: 0.9
                    },
                    {
                        requirement_key: 'fastapi',
                        matched: true,
                        evidence: [{ quote: 'Production FastAPI services' }]
                    }
                ]
            }));

            const { evidenceMap, audit } = await matcher.match(RESUME, document);

            expect(evidenceMap.role_id).toBe('role_test');
            expect(evidenceMap.jd_hash).toBe(document.jd_hash);
            expect(evidenceMap.resume_hash).toBe(hashText(RESUME));
            expect(evidenceMap.run_id).toBe('run-fixed');
            expect(evidenceMap.prompt_version).toBe('MATCH_EVIDENCE_V2');
            expect(evidenceMap.model_id).toBe('gpt-4o-mini');

            expect(evidenceMap.matches[0]).toEqual({
                requirement_id: 'REQ-aaaaaaaaaa',
                requirement_key: 'python',
                matched: true,
                evidence: [{ quote: 'Python APIs with FastAPI', resume_section: 'Summary' }],
                notes: 'stated directly',
                invalid_quote: false
            });
            // Quote copied from the requirement description, not the résumé
            expect(evidenceMap.matches[1]).toEqual({
                requirement_id: 'REQ-bbbbbbbbbb',
                requirement_key: 'fastapi',
                matched: false,
                evidence: [],
                notes: '',
                invalid_quote: true
            });
            expect(evidenceMap.meta).toEqual({
                matched_count_raw: 2,
                matched_count_validated: 1,
                invalid_quote_count: 1,
                evidence_prompt_includes_description: false
            });

            expect(audit.prompt_hash).toBe(hashText(`${JSON.stringify(requirementsForPrompt([python, fastapi]))}\n---\n${RESUME}`));
            expect(audit.attempts).toBe(1);
        });

        it('should retry once after an off-contract payload', async () => {
            mockOpenAI.generateJsonCompletion
                .mockResolvedValueOnce(JSON.stringify({ matches: 'none' }))
                .mockResolvedValueOnce(JSON.stringify({ matches: [] }));

            const { evidenceMap, audit } = await matcher.match(RESUME, document);

            expect(mockOpenAI.generateJsonCompletion).toHaveBeenCalledTimes(2);
            expect(evidenceMap.matches).toEqual([]);
            expect(audit.attempts).toBe(2);
        });

        it('should fail with a generation error after two bad responses', async () => {
            mockOpenAI.generateJsonCompletion.mockResolvedValue('{"matches": [');

            await expect(matcher.match(RESUME, document)).rejects.toThrow(GenerationFailedError);
            expect(mockOpenAI.generateJsonCompletion).toHaveBeenCalledTimes(2);
        });
    });
});
