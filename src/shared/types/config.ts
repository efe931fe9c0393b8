import type { SessionStatus } from './session'

export interface ProviderSettings {
  baseURL: string
  timeoutMs: number
}

export interface SamplingSettings {
  temperature: number
  maxOutputTokens: number
}

export interface RetrySettings {
  maxAttempts: number
  initialDelayMs: number
  backoffFactor: number
  maxDelayMs: number
}

export interface StorageConfig {
  /** 数据根目录，为空时使用配置目录下的 data */
  dataDir: string
}

export type LogLevelSetting = 'error' | 'warn' | 'info' | 'debug'

/** 应用配置 */
export interface AppConfig {
  providers: Record<string, ProviderSettings>
  interviewer: SamplingSettings
  evaluation: SamplingSettings
  storage: StorageConfig
  retry: RetrySettings
  logLevel: LogLevelSetting
  history: {
    pageSize: number
    defaultStatus: SessionStatus | null
  }
}
