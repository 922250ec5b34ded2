import { describe, it, expect, beforeEach, vi } from 'vitest';
import OpenAI from 'openai';
import { OpenAIService, createOpenAIClient } from '../../../src/services/openai.service';
import { loadPipelineConfig } from '../../../src/config/pipeline-config';

// Mock implementations
const mockClient = {
    completeJson: vi.fn()
};

const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
};

const OPTIONS = { model: 'test-llm-model', temperature: 0, topP: 1 };

describe('OpenAI Service - Dependency Injection Tests', () => {
    let service: OpenAIService;

    beforeEach(() => {
        vi.clearAllMocks();
        service = new OpenAIService(mockClient, mockLogger, 2000);
    });

    describe('Constructor and Factory', () => {
        it('should create service with injected dependencies', () => {
            expect(service).toBeInstanceOf(OpenAIService);
        });

        it('should create service with factory method', () => {
            const prodService = OpenAIService.create(loadPipelineConfig({ LLM_API_KEY: 'test-secret' }));
            expect(prodService).toBeInstanceOf(OpenAIService);
        });
    });

    describe('generateJsonCompletion', () => {
        it('should forward sampling parameters and return trimmed content', async () => {
            mockClient.completeJson.mockResolvedValue({ content: '  {"matches": []}\n', totalTokens: 120 });

            const messages = [{ role: 'user' as const, content: 'Prompt text' }];
            const result = await service.generateJsonCompletion(messages, OPTIONS);

            expect(result).toBe('{"matches": []}');
            expect(mockClient.completeJson).toHaveBeenCalledWith({
                model: 'test-llm-model',
                messages,
                temperature: 0,
                top_p: 1,
                max_tokens: 2000
            });
            expect(mockLogger.info).toHaveBeenCalledWith(
                { tokensUsed: 120, contentLength: 15 },
                'Completion generated'
            );
        });

        it('should prefer an explicit max token count', async () => {
            mockClient.completeJson.mockResolvedValue({ content: '{}', totalTokens: 1 });

            await service.generateJsonCompletion([{ role: 'user', content: 'x' }], { ...OPTIONS, maxTokens: 50 });

            expect(mockClient.completeJson).toHaveBeenCalledWith(expect.objectContaining({ max_tokens: 50 }));
        });

        it('should throw when the model returns no content', async () => {
            mockClient.completeJson.mockResolvedValue({ content: null, totalTokens: 0 });
            await expect(service.generateJsonCompletion([{ role: 'user', content: 'x' }], OPTIONS))
                .rejects.toThrow('No content returned from model');

            mockClient.completeJson.mockResolvedValue({ content: '   ', totalTokens: 0 });
            await expect(service.generateJsonCompletion([{ role: 'user', content: 'x' }], OPTIONS))
                .rejects.toThrow('No content returned from model');
        });

        it('should let client errors propagate', async () => {
            mockClient.completeJson.mockRejectedValue(new Error('API Error'));

            await expect(service.generateJsonCompletion([{ role: 'user', content: 'x' }], OPTIONS))
                .rejects.toThrow('API Error');
        });
    });

    describe('createOpenAIClient', () => {
        it('should request a JSON object response from the SDK', async () => {
            const sdk = new OpenAI({ apiKey: 'test-secret', maxRetries: 0 });
            const create = vi.spyOn(sdk.chat.completions, 'create').mockImplementation(() => {
                throw new Error('unexpected network call');
            });

            const client = createOpenAIClient(sdk);

            await expect(client.completeJson({
                model: 'test-llm-model',
                messages: [{ role: 'user', content: 'x' }],
                temperature: 0,
                top_p: 1,
                max_tokens: 10
            })).rejects.toThrow('unexpected network call');

            expect(create).toHaveBeenCalledWith({
                model: 'test-llm-model',
                messages: [{ role: 'user', content: 'x' }],
                temperature: 0,
                top_p: 1,
                max_tokens: 10,
                response_format: { type: 'json_object' }
            });
        });
    });
});
