/**
 * 平台错误：一组封闭的错误类型，调用方按 kind 区分处理。
 * message 需点明出错的子系统（database / provider credentials / file storage）。
 */
export type PlatformErrorKind = 'configuration' | 'ai-provider' | 'data-store' | 'communication'

export type AIProviderErrorCode =
  | 'authentication'
  | 'rate-limit'
  | 'bad-request'
  | 'unavailable'
  | 'timeout'
  | 'transport'
  | 'malformed-output'
  | 'cancelled'

const AI_PROVIDER_ERROR_CODES: readonly AIProviderErrorCode[] = [
  'authentication',
  'rate-limit',
  'bad-request',
  'unavailable',
  'timeout',
  'transport',
  'malformed-output',
  'cancelled',
]

export function isAIProviderErrorCode(code: string | undefined): code is AIProviderErrorCode {
  return AI_PROVIDER_ERROR_CODES.some((c) => c === code)
}

export interface PlatformErrorOptions {
  code?: string
  subsystem?: string
  cause?: unknown
}

export class PlatformError extends Error {
  readonly kind: PlatformErrorKind
  readonly code: string | undefined
  readonly subsystem: string | undefined

  constructor(kind: PlatformErrorKind, message: string, options: PlatformErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'PlatformError'
    this.kind = kind
    this.code = options.code
    this.subsystem = options.subsystem
  }
}

export function configurationError(message: string, options?: PlatformErrorOptions): PlatformError {
  return new PlatformError('configuration', message, { subsystem: 'configuration', ...options })
}

export function aiProviderError(
  message: string,
  code: AIProviderErrorCode,
  options?: Omit<PlatformErrorOptions, 'code'>
): PlatformError {
  return new PlatformError('ai-provider', message, { subsystem: 'language model provider', ...options, code })
}

export function dataStoreError(message: string, options?: PlatformErrorOptions): PlatformError {
  return new PlatformError('data-store', message, { subsystem: 'database', ...options })
}

export function communicationError(message: string, options?: PlatformErrorOptions): PlatformError {
  return new PlatformError('communication', message, { subsystem: 'file storage', ...options })
}

export function isPlatformError(err: unknown, kind?: PlatformErrorKind): err is PlatformError {
  if (!(err instanceof PlatformError)) return false
  return kind === undefined || err.kind === kind
}

export function toMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
