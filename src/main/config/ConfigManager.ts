import Conf from 'conf'
import dotenv from 'dotenv'
import { existsSync, readFileSync } from 'fs'
import { dirname, join } from 'path'
import type { AppConfig } from '@shared/types/config'
import type { LLMProvider } from '@shared/types/llm'
import { LLM_PROVIDER_PRESETS } from '@shared/constants'
import { DEFAULT_APP_CONFIG, DEFAULT_PROVIDER_TIMEOUT_MS, CONFIG_PROJECT_NAME } from './defaults'
import { appConfigSchema, formatIssues } from './schema'
import { configurationError } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('ConfigManager')

type ChangeCallback = (newValue: unknown, oldValue: unknown) => void

export interface ConfigManagerOptions {
  /** 配置文件目录（测试中传入临时目录） */
  cwd?: string
  /** .env 文件路径，进程环境变量优先 */
  envPath?: string
  env?: NodeJS.ProcessEnv
}

export class ConfigManager {
  private store: Conf<AppConfig>
  private listeners: Map<string, Set<ChangeCallback>>
  private env: Record<string, string | undefined>

  constructor(options: ConfigManagerOptions = {}) {
    this.store = new Conf<AppConfig>({
      projectName: CONFIG_PROJECT_NAME,
      configName: 'settings',
      defaults: DEFAULT_APP_CONFIG,
      ...(options.cwd ? { cwd: options.cwd } : {}),
    })
    this.listeners = new Map()
    this.env = this.loadEnv(options)
    this.validate(this.store.store)
  }

  /** 读取配置项 */
  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.store.get(key)
  }

  /** 校验后写入配置项并触发变更监听 */
  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    log.debug('配置更新', { key })
    const oldValue = this.store.get(key)
    this.validate({ ...this.store.store, [key]: value })
    this.store.set(key, value)
    this.notifyListeners(key, value, oldValue)
  }

  /** 监听配置项变更，返回取消订阅函数 */
  onChanged(key: keyof AppConfig, callback: ChangeCallback): () => void {
    let callbacks = this.listeners.get(key)
    if (!callbacks) {
      callbacks = new Set()
      this.listeners.set(key, callbacks)
    }
    callbacks.add(callback)
    return () => {
      this.listeners.get(key)?.delete(callback)
    }
  }

  /** 导出全部配置（不含密钥） */
  exportConfig(): AppConfig {
    return structuredClone(this.store.store)
  }

  /** 重置为默认配置 */
  resetToDefaults(): void {
    log.info('重置为默认配置')
    const oldConfig = this.store.store
    this.store.clear()
    const newConfig = this.store.store
    for (const key of Object.keys(oldConfig)) {
      if (!isConfigKey(key)) continue
      if (JSON.stringify(oldConfig[key]) !== JSON.stringify(newConfig[key])) {
        this.notifyListeners(key, newConfig[key], oldConfig[key])
      }
    }
  }

  /** 获取配置文件路径（用于调试） */
  getConfigPath(): string {
    return this.store.path
  }

  /** 数据根目录：未配置时放在配置文件旁的 data 目录 */
  getDataDir(): string {
    const configured = this.get('storage').dataDir.trim()
    return configured || join(dirname(this.store.path), 'data')
  }

  /** 组装供应商连接配置，API Key 只来自环境变量 */
  resolveProvider(providerId: string): LLMProvider {
    const preset = LLM_PROVIDER_PRESETS.find((p) => p.id === providerId)
    if (!preset) {
      throw configurationError(`unknown language model provider: ${providerId}`, { code: 'unknown-provider' })
    }

    const apiKey = this.env[preset.apiKeyEnv]?.trim()
    if (!apiKey) {
      throw configurationError(
        `provider credentials missing for ${preset.name}: set ${preset.apiKeyEnv}`,
        { code: 'missing-credentials', subsystem: 'provider credentials' }
      )
    }

    const settings = this.get('providers')[providerId]
    return {
      id: preset.id,
      baseURL: settings?.baseURL ?? preset.baseURL,
      apiKey,
      apiStyle: preset.apiStyle,
      timeoutMs: settings?.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
    }
  }

  private loadEnv(options: ConfigManagerOptions): Record<string, string | undefined> {
    const env = options.env ?? process.env
    if (!options.envPath || !existsSync(options.envPath)) {
      return { ...env }
    }
    const fromFile = dotenv.parse(readFileSync(options.envPath))
    log.debug('加载 .env 文件', { path: options.envPath, keys: Object.keys(fromFile).length })
    return { ...fromFile, ...env }
  }

  private validate(config: unknown): void {
    const result = appConfigSchema.safeParse(config)
    if (!result.success) {
      throw configurationError(`invalid configuration: ${formatIssues(result.error)}`, { code: 'invalid-config' })
    }
  }

  private notifyListeners(key: string, newValue: unknown, oldValue: unknown): void {
    const callbacks = this.listeners.get(key)
    if (callbacks) {
      for (const cb of callbacks) {
        try {
          cb(newValue, oldValue)
        } catch (err) {
          log.error('配置监听回调执行异常', { key, error: err })
        }
      }
    }
  }
}

function isConfigKey(key: string): key is keyof AppConfig {
  return key in DEFAULT_APP_CONFIG
}
