import OpenAI, { AzureOpenAI } from 'openai';
import { logger, ILogger } from '../config/logger';
import { Env, getEnv } from '../config/env';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';
import { EmbeddingVector } from '../types/catalog';
import { ProviderUnavailableError, getErrorMessage } from '../utils/errors';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface CompletionOptions {
    temperature?: number;
    max_tokens?: number;
    response_format?: { type: 'json_object' };
}

// Interfaces for better testability
export interface IOpenAIClient {
    embeddings: {
        create(params: {
            model: string;
            input: string[];
            encoding_format: 'float';
        }): Promise<{
            data: Array<{ embedding: number[] }>;
        }>;
    };
    chat: {
        completions: {
            create(params: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
                response_format?: { type: 'json_object' };
            }): Promise<{
                choices: Array<{ message: { content: string | null } }>;
                usage?: { total_tokens: number };
            }>;
        };
    };
}

/**
 * The embedding capability consumers depend on. Passed in explicitly,
 * constructed once by the application.
 */
export interface IEmbeddingProvider {
    generateEmbeddings(texts: string[]): Promise<EmbeddingVector[]>;
    generateEmbedding(text: string): Promise<EmbeddingVector>;
}

export interface IOpenAIService extends IEmbeddingProvider {
    generateCompletion(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
    testConnection(): Promise<boolean>;
}

export interface OpenAIServiceOptions {
    embeddingModel: string;
    llmModel: string;
    temperature: number;
}

const UNAVAILABLE_STATUSES = new Set([401, 403, 404]);

/**
 * True when the provider rejects the request for a reason retrying cannot
 * fix: unknown deployment or model, or rejected credentials.
 */
export function isProviderUnavailableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
        return false;
    }

    const status = 'status' in error ? error.status : undefined;
    if (typeof status === 'number' && UNAVAILABLE_STATUSES.has(status)) {
        return true;
    }

    const code = 'code' in error ? error.code : undefined;
    if (code === 'DeploymentNotFound' || code === 'model_not_found') {
        return true;
    }

    return getErrorMessage(error).includes('DeploymentNotFound');
}

/**
 * OpenAI Service with Dependency Injection
 *
 * Embeddings and chat completions against OpenAI or Azure OpenAI. With
 * Azure, model names are deployment names.
 */
export class OpenAIService implements IOpenAIService {
    private readonly embeddingModel: string;
    private readonly llmModel: string;
    private readonly temperature: number;

    constructor(
        private client: IOpenAIClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        options: OpenAIServiceOptions = {
            embeddingModel: 'text-embedding-3-small',
            llmModel: 'gpt-4o-mini',
            temperature: 0.1
        }
    ) {
        this.embeddingModel = options.embeddingModel;
        this.llmModel = options.llmModel;
        this.temperature = options.temperature;
    }

    /**
     * Factory method for production use
     */
    static create(env: Env = getEnv()): OpenAIService {
        if (env.AZURE_OPENAI_ENDPOINT) {
            const client = new AzureOpenAI({
                endpoint: env.AZURE_OPENAI_ENDPOINT,
                apiKey: env.AZURE_OPENAI_API_KEY,
                apiVersion: env.AZURE_OPENAI_API_VERSION
            });

            return new OpenAIService(client, RetryUtil, logger, {
                embeddingModel: env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT,
                llmModel: env.AZURE_OPENAI_DEPLOYMENT_NAME,
                temperature: env.LLM_TEMPERATURE
            });
        }

        const client = new OpenAI({
            apiKey: env.OPENAI_API_KEY
        });

        return new OpenAIService(client, RetryUtil, logger, {
            embeddingModel: env.EMBEDDING_MODEL,
            llmModel: env.LLM_MODEL,
            temperature: env.LLM_TEMPERATURE
        });
    }

    /**
     * Generate embeddings for text
     *
     * @throws ProviderUnavailableError when the embedding model or
     * deployment cannot be reached at all
     */
    async generateEmbeddings(texts: string[]): Promise<EmbeddingVector[]> {
        if (texts.length === 0) {
            return [];
        }

        return await this.retryUtil.executeWithRetry(
            async () => {
                this.logger.info({
                    textsCount: texts.length,
                    model: this.embeddingModel
                }, 'Generating OpenAI embeddings');

                const response = await this.callProvider('embedding', () =>
                    this.client.embeddings.create({
                        model: this.embeddingModel,
                        input: texts,
                        encoding_format: 'float'
                    })
                );

                const embeddings = response.data.map(item => item.embedding);
                if (embeddings.length !== texts.length) {
                    throw new Error(`Expected ${texts.length} embeddings, received ${embeddings.length}`);
                }

                this.logger.info({
                    embeddingsCount: embeddings.length,
                    dimension: embeddings[0]?.length || 0
                }, 'OpenAI embeddings generated successfully');

                return embeddings;
            },
            {
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'OpenAI embeddings generation'
            }
        );
    }

    /**
     * Generate single embedding for text
     */
    async generateEmbedding(text: string): Promise<EmbeddingVector> {
        const [embedding] = await this.generateEmbeddings([text]);
        return embedding;
    }

    /**
     * Generate LLM completion
     */
    async generateCompletion(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
        const temperature = options.temperature ?? this.temperature;

        return await this.retryUtil.executeWithRetry(
            async () => {
                this.logger.info({
                    messagesCount: messages.length,
                    model: this.llmModel,
                    temperature
                }, 'Generating OpenAI completion');

                const response = await this.callProvider('completion', () =>
                    this.client.chat.completions.create({
                        model: this.llmModel,
                        messages,
                        temperature,
                        max_tokens: options.max_tokens ?? 1000,
                        response_format: options.response_format
                    })
                );

                const content = response.choices[0]?.message?.content;
                if (!content) {
                    throw new Error('No content returned from OpenAI');
                }

                this.logger.info({
                    tokensUsed: response.usage?.total_tokens ?? 0,
                    contentLength: content.length
                }, 'OpenAI completion generated successfully');

                return content;
            },
            {
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'OpenAI completion generation'
            }
        );
    }

    /**
     * Test OpenAI connection
     */
    async testConnection(): Promise<boolean> {
        try {
            await this.generateEmbedding('test');
            this.logger.info({}, 'OpenAI connection test successful');
            return true;
        } catch (error) {
            this.logger.error({ err: error }, 'OpenAI connection test failed');
            return false;
        }
    }

    /**
     * Run a provider call, turning "cannot serve at all" failures into
     * ProviderUnavailableError so the retry loop stops immediately.
     */
    private async callProvider<T>(kind: 'embedding' | 'completion', call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            if (isProviderUnavailableError(error)) {
                const model = kind === 'embedding' ? this.embeddingModel : this.llmModel;
                this.logger.warn({ model, error: getErrorMessage(error) }, `OpenAI ${kind} provider unavailable`);
                throw new ProviderUnavailableError(
                    `${kind === 'embedding' ? 'Embedding' : 'Completion'} model '${model}' is unavailable: ${getErrorMessage(error)}`,
                    error
                );
            }
            throw error;
        }
    }
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create();
    }
    return openaiService;
}
