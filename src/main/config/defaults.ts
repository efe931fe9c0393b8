import type { AppConfig } from '@shared/types/config'
import { LLM_PROVIDER_PRESETS } from '@shared/constants'
import { DEFAULT_RETRY_POLICY } from '../db/retryPolicy'

/** 模型请求超时 */
export const DEFAULT_PROVIDER_TIMEOUT_MS = 60_000

/** 完整的默认应用配置（不含 API Key，密钥只从环境变量读取） */
export const DEFAULT_APP_CONFIG: AppConfig = {
  providers: Object.fromEntries(
    LLM_PROVIDER_PRESETS.map((preset) => [
      preset.id,
      { baseURL: preset.baseURL, timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS },
    ])
  ),
  interviewer: {
    temperature: 0.7,
    maxOutputTokens: 2000,
  },
  evaluation: {
    temperature: 0.3,
    maxOutputTokens: 2000,
  },
  storage: {
    dataDir: '',
  },
  retry: { ...DEFAULT_RETRY_POLICY },
  logLevel: 'info',
  history: {
    pageSize: 50,
    defaultStatus: null,
  },
}

export const CONFIG_PROJECT_NAME = 'interview-session-core'
