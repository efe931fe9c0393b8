import { join } from 'path'
import type Database from 'better-sqlite3'
import type { LLMClient } from '@shared/types/llm'
import { ConfigManager } from './config/ConfigManager'
import type { ConfigManagerOptions } from './config/ConfigManager'
import { getDatabase, closeDatabase } from './db/database'
import { DataStore } from './db/DataStore'
import type { Sleep } from './db/retryPolicy'
import { FileStorage } from './storage/FileStorage'
import { LLMService } from './services/LLMService'
import { TokenTracker } from './services/TokenTracker'
import { AIInterviewer } from './services/AIInterviewer'
import type { LLMClientFactory } from './services/AIInterviewer'
import { EvaluationManager } from './services/EvaluationManager'
import { CommunicationManager } from './services/CommunicationManager'
import { SessionManager } from './services/SessionManager'
import { ResumeParser } from './services/ResumeParser'
import { ResumeManager } from './services/ResumeManager'
import { initializeLogger, attachAuditSink, getLogger } from './logger'

export * from './errors'
export type * from '@shared/types'
export type { LLMClientFactory } from './services/AIInterviewer'
export { SessionManager } from './services/SessionManager'
export { AIInterviewer } from './services/AIInterviewer'
export { EvaluationManager } from './services/EvaluationManager'
export { CommunicationManager } from './services/CommunicationManager'
export { TokenTracker } from './services/TokenTracker'
export { ResumeManager } from './services/ResumeManager'
export { DataStore } from './db/DataStore'
export { ConfigManager } from './config/ConfigManager'

const log = getLogger('App')

export interface CreateAppOptions extends ConfigManagerOptions {
  /** 覆盖配置中的数据目录 */
  dataDir?: string
  /** 外部提供的数据库连接（测试中使用内存库） */
  db?: Database.Database
  /** 替换默认的 HTTP 模型客户端 */
  clientFactory?: LLMClientFactory
  sleep?: Sleep
}

export interface InterviewApp {
  config: ConfigManager
  dataStore: DataStore
  sessions: SessionManager
  interviewer: AIInterviewer
  evaluations: EvaluationManager
  communication: CommunicationManager
  tokens: TokenTracker
  resumes: ResumeManager
  close(): void
}

/**
 * 组装全部组件。
 *   1. 配置与日志
 *   2. 数据库、持久化门面、文件存储
 *   3. 审计 transport（warn/error 写入 audit_logs）
 *   4. 模型客户端与业务组件
 */
export function createApp(options: CreateAppOptions = {}): InterviewApp {
  // 1. Config + Logger
  const config = new ConfigManager(options)
  const dataDir = options.dataDir ?? config.getDataDir()
  initializeLogger({ logsDir: join(dataDir, 'logs'), level: config.get('logLevel') })
  log.info('应用启动', { dataDir, configPath: config.getConfigPath() })

  // 2. Database + Storage
  const ownsDatabase = !options.db
  const db = options.db ?? getDatabase({ dbPath: join(dataDir, 'interviews.db') })
  const dataStore = new DataStore(db, { retryPolicy: config.get('retry'), sleep: options.sleep })
  const storage = new FileStorage(join(dataDir, 'sessions'))

  // 3. Audit
  const detachAudit = attachAuditSink((entry) => dataStore.saveAuditLog(entry))

  // 4. Services
  const clientFor = options.clientFactory ?? createClientFactory(config)
  const tokens = new TokenTracker(dataStore)
  const interviewer = new AIInterviewer(dataStore, tokens, clientFor, storage, config.get('interviewer'))
  const evaluations = new EvaluationManager(dataStore, clientFor, tokens, config.get('evaluation'))
  const communication = new CommunicationManager(dataStore, storage)
  const sessions = new SessionManager(dataStore, evaluations, storage, { pageSize: config.get('history').pageSize })
  const resumes = new ResumeManager(dataStore, new ResumeParser(), clientFor)

  return {
    config,
    dataStore,
    sessions,
    interviewer,
    evaluations,
    communication,
    tokens,
    resumes,
    close() {
      detachAudit()
      if (ownsDatabase) closeDatabase()
      log.info('应用关闭')
    },
  }
}

/** 按供应商缓存 HTTP 客户端；供应商配置变更时清空缓存 */
function createClientFactory(config: ConfigManager): LLMClientFactory {
  const clients = new Map<string, LLMClient>()
  config.onChanged('providers', () => {
    clients.clear()
  })

  return (providerId) => {
    let client = clients.get(providerId)
    if (!client) {
      client = new LLMService(config.resolveProvider(providerId))
      clients.set(providerId, client)
    }
    return client
  }
}
