export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

export interface ChatParams {
    model?: string
    messages: ChatMessage[]
    temperature?: number
    maxTokens?: number
    jsonMode?: boolean
    signal?: AbortSignal
}

export interface ChatResponse {
    content: string | null
    finishReason: 'stop' | 'length'
    usage: { promptTokens: number; completionTokens: number }
}

export interface LLMClient {
    chat(params: ChatParams): Promise<ChatResponse>
}
