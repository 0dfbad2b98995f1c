import { Ollama, type ChatResponse as OllamaChatResponse, type Options } from 'ollama';
import type { LLMClient, LLMConfig, Message, ChatOptions, ChatResponse } from './types.js';
import { ModelUnavailableError } from '../types/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { logger } from '../utils/logger.js';

const DEFAULT_TIMEOUT_MS = 60_000;

export class OllamaClient implements LLMClient {
    private readonly host: string;
    private readonly model: string;
    private readonly timeoutMs: number;
    private readonly temperature?: number;
    private readonly fetchImpl: typeof fetch;

    constructor(config: LLMConfig) {
        // Ollama library expects 'host' (e.g. 'http://127.0.0.1:11434')
        this.host = config.baseUrl;
        this.model = config.model;
        this.timeoutMs = config.timeout ?? DEFAULT_TIMEOUT_MS;
        this.temperature = config.temperature;
        this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    }

    getModel(): string {
        return this.model;
    }

    async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
        const requestOptions: Partial<Options> = {};
        const temperature = options.temperature ?? this.temperature;
        if (temperature !== undefined) requestOptions.temperature = temperature;

        const timeout = AbortSignal.timeout(this.timeoutMs);
        const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

        // A client per request so the abort signal applies to this call only
        const client = new Ollama({
            host: this.host,
            fetch: (input, init) => this.fetchImpl(input, { ...init, signal })
        });

        logger.debug('Ollama request', {
            model: this.model,
            messageCount: messages.length
        });

        let response: OllamaChatResponse;
        try {
            response = await client.chat({
                model: this.model,
                messages,
                options: requestOptions,
                stream: false
            });
        } catch (error) {
            const reason = timeout.aborted
                ? `timed out after ${this.timeoutMs}ms`
                : options.signal?.aborted
                    ? 'request cancelled'
                    : getErrorMessage(error);
            logger.error('Ollama request failed', { error: reason, host: this.host });
            throw new ModelUnavailableError(`Ollama API error: ${reason}`, { cause: error });
        }

        return this.parseResponse(response);
    }

    private parseResponse(response: OllamaChatResponse): ChatResponse {
        return {
            content: response.message?.content ?? '',
            finishReason: response.done_reason === 'length' ? 'length' : 'stop'
        };
    }
}
