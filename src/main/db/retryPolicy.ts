import type { RetrySettings } from '@shared/types/config'

/** 持久化层的重试策略（只用于 DataStore 边界，不用于模型调用） */
export type RetryPolicy = Readonly<RetrySettings>

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 100,
  backoffFactor: 2,
  maxDelayMs: 2000,
}

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_PROTOCOL'])

/** 可重试的 SQLite 错误：锁冲突与 I/O 错误 */
export function isTransientStoreError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false
  const code = err.code
  if (typeof code !== 'string') return false
  return TRANSIENT_SQLITE_CODES.has(code) || code.startsWith('SQLITE_BUSY_') || code.startsWith('SQLITE_IOERR')
}

/** 第 attempt 次失败后的等待时长（attempt 从 1 开始） */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1)
  return Math.min(delay, policy.maxDelayMs)
}

export type Sleep = (ms: number) => Promise<void>

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface RetryHooks {
  sleep?: Sleep
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void
}

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`gave up after ${attempts} attempts`, { cause: lastError })
    this.name = 'RetryExhaustedError'
  }
}

/**
 * 按策略执行：仅对瞬时错误重试，其它错误立即抛出；
 * 用尽次数后抛出 RetryExhaustedError。
 */
export async function withRetry<T>(policy: RetryPolicy, fn: () => T, hooks: RetryHooks = {}): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts))

  for (let attempt = 1; ; attempt++) {
    try {
      return fn()
    } catch (err) {
      if (!isTransientStoreError(err)) throw err
      if (attempt >= maxAttempts) throw new RetryExhaustedError(attempt, err)
      const delay = backoffDelay(policy, attempt)
      hooks.onRetry?.(attempt, delay, err)
      await sleep(delay)
    }
  }
}
