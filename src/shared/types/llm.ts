export type ProviderApiStyle = 'openai-compatible' | 'anthropic'

/** 模型单价（美元 / 百万 token） */
export interface ModelPricing {
  model: string
  inputPerMillion: number
  outputPerMillion: number
}

/** LLM 供应商预设（不含用户凭证） */
export interface LLMProviderPreset {
  id: string
  name: string
  baseURL: string
  apiStyle: ProviderApiStyle
  /** 读取 API Key 的环境变量 */
  apiKeyEnv: string
  defaultModel: string
  models: ModelPricing[]
}

/** LLM 供应商连接配置 */
export interface LLMProvider {
  id: string
  baseURL: string
  apiKey: string
  apiStyle: ProviderApiStyle
  timeoutMs: number
}

/** 多模态消息片段（图片使用 data URL） */
export type ChatMessageContent =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } }

/** 聊天消息 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string | ChatMessageContent[]
}

export interface GenerateRequest {
  messages: ChatMessage[]
  model: string
  temperature: number
  maxOutputTokens: number
  signal?: AbortSignal
}

export interface GenerateResult {
  text: string
  inputTokens: number
  outputTokens: number
}

/** 语言模型调用接口 */
export interface LLMClient {
  generate(request: GenerateRequest): Promise<GenerateResult>
}
