import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { classifyHttpError, TransientIOError } from '../core/errors.js'
import { CircuitBreaker, withRetry } from '../core/retry.js'
import type { Logger } from '../logger/index.js'
import type { ChatMessage, ChatParams, ChatResponse, LLMClient } from './types.js'

type LLMConfig = Pick<ResolvedConfig, 'apiKey' | 'baseURL' | 'model' | 'temperature' | 'retry'>

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'user':
            return { role: 'user', content: message.content }
        case 'assistant':
            return { role: 'assistant', content: message.content }
    }
}

export function createLLMClient(config: LLMConfig, logger: Logger): LLMClient {
    // Built on the first chat; offline commands never reach it.
    let openai: OpenAI | null = null
    const connect = (): OpenAI => {
        openai ??= new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            defaultHeaders: { 'X-Title': 'parley' },
        })
        return openai
    }

    const breaker = new CircuitBreaker()

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const model = params.model ?? config.model

            const result = await breaker.execute(() =>
                withRetry(
                    async () => {
                        let response: OpenAI.ChatCompletion
                        try {
                            response = await connect().chat.completions.create(
                                {
                                    model,
                                    messages: params.messages.map(toOpenAIMessage),
                                    temperature: params.temperature ?? config.temperature,
                                    max_tokens: params.maxTokens,
                                    response_format: params.jsonMode ? { type: 'json_object' } : undefined,
                                },
                                { signal: params.signal }
                            )
                        } catch (error) {
                            if (error instanceof OpenAI.APIError && error.status !== undefined && classifyHttpError(error.status) === 'transient') {
                                throw new TransientIOError(`LLM HTTP ${error.status}`, { cause: error })
                            }
                            throw error
                        }

                        const choice = response.choices[0]
                        if (!choice) throw new Error('No response from LLM')

                        return {
                            content: choice.message.content,
                            finishReason: choice.finish_reason === 'length' ? 'length' : 'stop',
                            usage: {
                                promptTokens: response.usage?.prompt_tokens ?? 0,
                                completionTokens: response.usage?.completion_tokens ?? 0,
                            },
                        } satisfies ChatResponse
                    },
                    {
                        ...config.retry,
                        onRetry: (error, attempt) => logger.warn({ model, attempt, error }, 'llm:retry'),
                    }
                )
            )

            logger.debug({ model, usage: result.usage, finishReason: result.finishReason }, 'llm:response')
            return result
        },
    }
}
