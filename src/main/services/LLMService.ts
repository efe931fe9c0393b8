import { z } from 'zod'
import type {
  ChatMessage,
  ChatMessageContent,
  GenerateRequest,
  GenerateResult,
  LLMClient,
  LLMProvider,
} from '@shared/types/llm'
import { aiProviderError, isPlatformError, toMessage } from '../errors'
import type { AIProviderErrorCode } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('LLMService')

const ANTHROPIC_VERSION = '2023-06-01'

const openAIResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative().default(0),
      completion_tokens: z.number().int().nonnegative().default(0),
    })
    .optional(),
})

const anthropicResponseSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .default([]),
  usage: z
    .object({
      input_tokens: z.number().int().nonnegative().default(0),
      output_tokens: z.number().int().nonnegative().default(0),
    })
    .optional(),
})

type AnthropicContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } }

interface AnthropicMessage {
  role: 'user' | 'assistant'
  content: string | AnthropicContentBlock[]
}

/**
 * 语言模型客户端：OpenAI 兼容接口与 Anthropic Messages 接口。
 * 每次 generate 只请求一次，不做重试，错误统一映射为 ai-provider 错误。
 */
export class LLMService implements LLMClient {
  private config: LLMProvider

  constructor(config: LLMProvider) {
    this.config = { ...config }
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    log.debug('开始 LLM 请求', { provider: this.config.id, model: request.model, messages: request.messages.length })

    const result = this.config.apiStyle === 'anthropic'
      ? await this.generateAnthropic(request)
      : await this.generateOpenAICompatible(request)

    if (!result.text.trim()) {
      throw aiProviderError(
        `language model provider ${this.config.id} returned empty output for ${request.model}`,
        'malformed-output'
      )
    }
    return result
  }

  private async generateOpenAICompatible(request: GenerateRequest): Promise<GenerateResult> {
    const url = this.buildChatCompletionsUrl(this.config.baseURL)
    const json = await this.post(url, request, {
      Authorization: `Bearer ${this.config.apiKey}`,
    }, {
      model: request.model,
      messages: request.messages,
      max_tokens: request.maxOutputTokens,
      temperature: request.temperature,
      stream: false,
    })

    const parsed = openAIResponseSchema.safeParse(json)
    if (!parsed.success) {
      throw aiProviderError(`language model provider ${this.config.id} returned an unexpected response body`, 'malformed-output')
    }

    return {
      text: parsed.data.choices[0]?.message?.content ?? '',
      inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
      outputTokens: parsed.data.usage?.completion_tokens ?? 0,
    }
  }

  private async generateAnthropic(request: GenerateRequest): Promise<GenerateResult> {
    const url = `${this.ensureVersion(this.config.baseURL)}/messages`
    const { system, messages } = toAnthropicMessages(request.messages)
    const json = await this.post(url, request, {
      'x-api-key': this.config.apiKey,
      'anthropic-version': ANTHROPIC_VERSION,
    }, {
      model: request.model,
      messages,
      ...(system ? { system } : {}),
      max_tokens: request.maxOutputTokens,
      temperature: request.temperature,
    })

    const parsed = anthropicResponseSchema.safeParse(json)
    if (!parsed.success) {
      throw aiProviderError(`language model provider ${this.config.id} returned an unexpected response body`, 'malformed-output')
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')

    return {
      text,
      inputTokens: parsed.data.usage?.input_tokens ?? 0,
      outputTokens: parsed.data.usage?.output_tokens ?? 0,
    }
  }

  /** 内部：发送请求并把 HTTP / 网络错误映射为 ai-provider 错误 */
  private async post(
    url: string,
    request: GenerateRequest,
    headers: Record<string, string>,
    body: object
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs)
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout

    let response: Response
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal,
      })
    } catch (err) {
      throw this.mapFetchError(err, request)
    }

    if (!response.ok) {
      const text = await response.text().catch((err: unknown) => toMessage(err))
      log.error('LLM API 请求失败', { provider: this.config.id, status: response.status })
      const code = statusToCode(response.status)
      throw aiProviderError(describeStatus(this.config.id, response.status, code, text), code)
    }

    try {
      return await response.json()
    } catch (err) {
      throw aiProviderError(
        `language model provider ${this.config.id} returned invalid JSON: ${toMessage(err)}`,
        'malformed-output',
        { cause: err }
      )
    }
  }

  private mapFetchError(err: unknown, request: GenerateRequest): Error {
    if (isPlatformError(err)) return err
    if (request.signal?.aborted) {
      return aiProviderError(`language model request to ${this.config.id} was cancelled`, 'cancelled', { cause: err })
    }
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      return aiProviderError(
        `language model provider ${this.config.id} timed out after ${this.config.timeoutMs}ms`,
        'timeout',
        { cause: err }
      )
    }
    return aiProviderError(
      `language model provider ${this.config.id} is unreachable: ${toMessage(err)}`,
      'transport',
      { cause: err }
    )
  }

  private buildChatCompletionsUrl(baseURL: string): string {
    const base = this.ensureVersion(baseURL)
    return `${base}/chat/completions`
  }

  private ensureVersion(baseURL: string): string {
    const base = baseURL.replace(/\/+$/, '')
    return /\/v\d+$/i.test(base) ? base : `${base}/v1`
  }
}

/**
 * Anthropic 要求 system 单独传入、user/assistant 交替且以 user 开头；
 * 图片片段转为 base64 image block
 */
export function toAnthropicMessages(messages: ChatMessage[]): { system: string; messages: AnthropicMessage[] } {
  const systemParts: string[] = []
  const merged: AnthropicMessage[] = []

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(textOf(message.content))
      continue
    }
    const content = typeof message.content === 'string' ? message.content : message.content.map(toAnthropicBlock)
    const last = merged[merged.length - 1]
    if (last && last.role === message.role) {
      last.content = mergeContent(last.content, content)
    } else {
      merged.push({ role: message.role, content })
    }
  }

  if (merged.length === 0 || merged[0]?.role === 'assistant') {
    merged.unshift({ role: 'user', content: 'Please begin.' })
  }

  return { system: systemParts.join('\n\n'), messages: merged }
}

function mergeContent(
  left: string | AnthropicContentBlock[],
  right: string | AnthropicContentBlock[]
): string | AnthropicContentBlock[] {
  if (typeof left === 'string' && typeof right === 'string') return `${left}\n\n${right}`
  return [...toBlocks(left), ...toBlocks(right)]
}

function toBlocks(content: string | AnthropicContentBlock[]): AnthropicContentBlock[] {
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content
}

function toAnthropicBlock(part: ChatMessageContent): AnthropicContentBlock {
  if (part.type === 'text') return part
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(part.image_url.url)
  if (!match?.[1] || match[2] === undefined) {
    throw aiProviderError('Anthropic messages only accept base64 data URL images', 'bad-request')
  }
  return { type: 'image', source: { type: 'base64', media_type: match[1], data: match[2] } }
}

function textOf(content: string | ChatMessageContent[]): string {
  if (typeof content === 'string') return content
  return content
    .map((part) => (part.type === 'text' ? part.text : ''))
    .filter((text) => text.length > 0)
    .join('\n')
}

function statusToCode(status: number): AIProviderErrorCode {
  if (status === 401 || status === 403) return 'authentication'
  if (status === 429) return 'rate-limit'
  if (status >= 500) return 'unavailable'
  return 'bad-request'
}

function describeStatus(providerId: string, status: number, code: AIProviderErrorCode, body: string): string {
  const detail = body.trim().slice(0, 300)
  const suffix = detail ? `: ${detail}` : ''
  switch (code) {
    case 'authentication':
      return `language model provider ${providerId} rejected the provider credentials (HTTP ${status})${suffix}`
    case 'rate-limit':
      return `language model provider ${providerId} rate limit or quota exceeded (HTTP ${status})${suffix}`
    case 'unavailable':
      return `language model provider ${providerId} is unavailable (HTTP ${status})${suffix}`
    default:
      return `language model provider ${providerId} rejected the request (HTTP ${status})${suffix}`
  }
}
