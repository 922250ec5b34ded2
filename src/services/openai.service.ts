import OpenAI from 'openai';
import { logger, ILogger } from '../config/logger';
import { PipelineConfig } from '../config/pipeline-config';

export interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

export interface CompletionRequest {
    model: string;
    messages: ChatMessage[];
    temperature: number;
    top_p: number;
    max_tokens: number;
}

export interface CompletionResponse {
    content: string | null;
    totalTokens: number;
}

// Narrow view of the SDK so the service can be tested without the network
export interface IOpenAIClient {
    completeJson(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface CompletionOptions {
    model: string;
    temperature: number;
    topP: number;
    maxTokens?: number;
}

export interface IOpenAIService {
    generateJsonCompletion(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

/**
 * Adapt the OpenAI SDK to IOpenAIClient. Any OpenAI-compatible endpoint
 * works through `baseURL`.
 */
export function createOpenAIClient(sdk: OpenAI): IOpenAIClient {
    return {
        async completeJson(request: CompletionRequest): Promise<CompletionResponse> {
            const response = await sdk.chat.completions.create({
                model: request.model,
                messages: request.messages,
                temperature: request.temperature,
                top_p: request.top_p,
                max_tokens: request.max_tokens,
                response_format: { type: 'json_object' }
            });

            return {
                content: response.choices[0]?.message?.content ?? null,
                totalTokens: response.usage?.total_tokens ?? 0
            };
        }
    };
}

/**
 * OpenAI Service with Dependency Injection
 *
 * The text-generation collaborator. One call is one attempt: retries are
 * owned by the pipeline stage that parses the output, so the SDK's own
 * retries are switched off.
 */
export class OpenAIService implements IOpenAIService {
    constructor(
        private client: IOpenAIClient,
        private logger: ILogger,
        private defaultMaxTokens: number = 4000
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: PipelineConfig): OpenAIService {
        // Calls are gated on a configured key by MatchPipeline
        const sdk = new OpenAI({
            apiKey: config.apiKey ?? '',
            baseURL: config.baseUrl,
            timeout: config.requestTimeoutMs,
            maxRetries: 0
        });

        return new OpenAIService(
            createOpenAIClient(sdk),
            logger,
            config.maxTokens
        );
    }

    /**
     * Generate a completion constrained to a JSON object. Returns the raw
     * text; parsing is the caller's concern.
     */
    async generateJsonCompletion(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
        this.logger.info({
            messagesCount: messages.length,
            model: options.model,
            temperature: options.temperature
        }, 'Generating completion');

        const response = await this.client.completeJson({
            model: options.model,
            messages,
            temperature: options.temperature,
            top_p: options.topP,
            max_tokens: options.maxTokens ?? this.defaultMaxTokens
        });

        const content = response.content?.trim();
        if (!content) {
            throw new Error('No content returned from model');
        }

        this.logger.info({
            tokensUsed: response.totalTokens,
            contentLength: content.length
        }, 'Completion generated');

        return content;
    }
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(config: PipelineConfig): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create(config);
    }
    return openaiService;
}
