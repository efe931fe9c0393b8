import type Database from 'better-sqlite3'
import { randomUUID } from 'crypto'
import type {
  AuditLogEntry,
  CommunicationMode,
  ExperienceLevel,
  MediaFile,
  MediaKind,
  Message,
  MessageRole,
  PerformanceIndicators,
  ResumeData,
  Session,
} from '@shared/types/session'
import type { EvaluationReport } from '@shared/types/evaluation'
import { SessionRepo } from './repositories/SessionRepo'
import type { SessionListOptions, StatusTransition } from './repositories/SessionRepo'
import { ResumeRepo } from './repositories/ResumeRepo'
import { MessageRepo } from './repositories/MessageRepo'
import { MediaFileRepo } from './repositories/MediaFileRepo'
import { TokenUsageRepo } from './repositories/TokenUsageRepo'
import type { TokenUsageRow, UsageAggregateRow } from './repositories/TokenUsageRepo'
import { EvaluationRepo } from './repositories/EvaluationRepo'
import { AuditLogRepo } from './repositories/AuditLogRepo'
import { DEFAULT_RETRY_POLICY, RetryExhaustedError, withRetry } from './retryPolicy'
import type { RetryPolicy, Sleep } from './retryPolicy'
import { configurationError, dataStoreError, isPlatformError, toMessage } from '../errors'
import type { PlatformError } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('DataStore')

export interface DataStoreOptions {
  retryPolicy?: RetryPolicy
  sleep?: Sleep
}

export interface NewMessage {
  sessionId: string
  role: MessageRole
  content: string
}

/** 媒体写入器：在事务内写文件，事务回滚时删除 */
export interface MediaWriter {
  write(sequence: number): { filePath: string; sizeBytes: number }
  discard(filePath: string): void
}

export interface AppendMessageOptions {
  /** 仅在会话尚无消息时写入（开场白只写一次） */
  requireEmpty?: boolean
  /** 仅在会话为 active 且未进入结束流程时写入（候选人输入） */
  requireActive?: boolean
}

/** 面试官回复未写入的原因；对应的 token 用量仍已记录 */
export type TurnRejection = 'session-not-found' | 'session-ending' | 'invalid-status' | 'already-started'

export type InterviewerTurn = { message: Message } | { message: null; rejected: TurnRejection }

export interface HealthStatus {
  ok: boolean
  latencyMs: number
  error?: string
}

/**
 * 持久化门面：所有调用都在显式重试策略下执行。
 * 只对瞬时错误重试；非幂等写入通过预生成 id 或唯一键保证重复执行无副作用。
 */
export class DataStore {
  private sessions: SessionRepo
  private resumes: ResumeRepo
  private messages: MessageRepo
  private media: MediaFileRepo
  private usage: TokenUsageRepo
  private evaluations: EvaluationRepo
  private auditLogs: AuditLogRepo
  private policy: RetryPolicy
  private sleep: Sleep | undefined

  constructor(private db: Database.Database, options: DataStoreOptions = {}) {
    this.sessions = new SessionRepo(db)
    this.resumes = new ResumeRepo(db)
    this.messages = new MessageRepo(db)
    this.media = new MediaFileRepo(db)
    this.usage = new TokenUsageRepo(db)
    this.evaluations = new EvaluationRepo(db)
    this.auditLogs = new AuditLogRepo(db)
    this.policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.sleep = options.sleep
  }

  // ── Session ──

  /** 会话与简历在同一事务中写入 */
  async createSession(session: Session, resume?: ResumeData & { experienceLevel: ExperienceLevel }): Promise<Session> {
    return this.run('create session', () =>
      this.db.transaction(() => {
        if (resume) this.resumes.upsert(resume, session.createdAt)
        return this.sessions.create(session)
      })()
    )
  }

  async getSession(id: string): Promise<Session | null> {
    return this.run('get session', () => this.sessions.getById(id))
  }

  async listSessions(options?: SessionListOptions): Promise<{ sessions: Session[]; total: number }> {
    return this.run('list sessions', () => this.sessions.list(options))
  }

  /** 状态比较并交换，当前状态不在 from 中时返回 false */
  async transitionSession(id: string, transition: StatusTransition): Promise<boolean> {
    return this.run('update session status', () => this.sessions.transition(id, transition))
  }

  /** 在事务内读取并改写活跃模式；会话不存在、已完成或正在结束时返回 null */
  async updateActiveModes(
    id: string,
    update: (current: CommunicationMode[]) => CommunicationMode[]
  ): Promise<CommunicationMode[] | null> {
    return this.run('update active modes', () =>
      this.db.transaction(() => {
        const session = this.sessions.getById(id)
        if (!session || session.status === 'completed' || session.endedAt !== null) return null
        const next = update(session.activeModes)
        this.sessions.setActiveModes(id, next)
        return next
      })()
    )
  }

  /** 进入结束流程：写入 ended_at，之后不再接受输入与媒体 */
  async beginEnding(id: string, endedAt: number): Promise<boolean> {
    return this.run('begin ending session', () => this.sessions.beginEnding(id, endedAt))
  }

  async cancelEnding(id: string): Promise<boolean> {
    return this.run('cancel ending session', () => this.sessions.cancelEnding(id))
  }

  async getPerformanceIndicators(id: string): Promise<PerformanceIndicators | null> {
    return this.run('get performance indicators', () => this.sessions.getPerformanceIndicators(id))
  }

  async savePerformanceIndicators(id: string, indicators: PerformanceIndicators): Promise<boolean> {
    return this.run('save performance indicators', () => this.sessions.setPerformanceIndicators(id, indicators))
  }

  async deleteSession(id: string): Promise<boolean> {
    return this.run('delete session', () => this.sessions.delete(id))
  }

  /** 会话完成与评估报告在同一事务中提交 */
  async completeSession(
    id: string,
    transition: Omit<StatusTransition, 'to'>,
    report: EvaluationReport
  ): Promise<boolean> {
    return this.run('complete session', () =>
      this.db.transaction(() => {
        const moved = this.sessions.transition(id, { ...transition, to: 'completed' })
        if (!moved) return false
        if (!this.evaluations.create(report)) {
          throw dataStoreError(`database already holds an evaluation for session ${id}`, { code: 'duplicate-evaluation' })
        }
        return true
      })()
    )
  }

  // ── Resume ──

  async saveResume(resume: ResumeData & { experienceLevel: ExperienceLevel }): Promise<void> {
    return this.run('save resume', () => this.resumes.upsert(resume))
  }

  async getResume(userId: string): Promise<ResumeData | null> {
    return this.run('get resume', () => this.resumes.getByUserId(userId))
  }

  // ── Conversation ──

  /**
   * 追加消息；时间戳不早于该会话最后一条消息。
   * 会话状态与消息数的检查和写入在同一事务中。
   */
  async appendMessage(input: NewMessage, options: AppendMessageOptions = {}): Promise<Message> {
    const id = randomUUID()
    return this.run('append message', () =>
      this.db.transaction(() => {
        const existing = this.messages.getById(id)
        if (existing) return existing
        if (options.requireActive) {
          const rejected = this.checkAcceptsInput(input.sessionId)
          if (rejected) throw turnRejectedError(input.sessionId, rejected)
        }
        if (options.requireEmpty && this.messages.countBySession(input.sessionId) > 0) {
          throw turnRejectedError(input.sessionId, 'already-started')
        }
        return this.insertMessage(id, input)
      })()
    )
  }

  /**
   * 面试官回复与本次调用的 token 用量在同一事务中提交。
   * 用量只要会话存在就写入；会话已完成、正在结束或（requireEmpty 时）已有消息，
   * 则不写回复并返回原因。
   */
  async appendInterviewerTurn(
    input: Omit<NewMessage, 'role'>,
    usage: TokenUsageRow,
    options: { requireEmpty?: boolean } = {}
  ): Promise<InterviewerTurn> {
    const id = randomUUID()
    return this.run('append interviewer turn', () =>
      this.db.transaction((): InterviewerTurn => {
        const existing = this.messages.getById(id)
        if (existing) return { message: existing }
        const session = this.sessions.getById(input.sessionId)
        if (!session) return { message: null, rejected: 'session-not-found' }

        this.usage.create(usage)
        if (session.status === 'completed' || session.status === 'created') {
          return { message: null, rejected: 'invalid-status' }
        }
        if (session.endedAt !== null) return { message: null, rejected: 'session-ending' }
        if (options.requireEmpty && this.messages.countBySession(input.sessionId) > 0) {
          return { message: null, rejected: 'already-started' }
        }
        return { message: this.insertMessage(id, { ...input, role: 'interviewer' }) }
      })()
    )
  }

  async getMessages(sessionId: string): Promise<Message[]> {
    return this.run('get messages', () => this.messages.listBySession(sessionId))
  }

  async countMessages(sessionId: string): Promise<number> {
    return this.run('count messages', () => this.messages.countBySession(sessionId))
  }

  // ── Media ──

  /**
   * 分配下一个序号、写文件、写记录在同一事务中完成。
   * 任一步失败时删除已写文件，重试会重新分配同一序号。
   */
  async appendMediaFile(sessionId: string, kind: MediaKind, writer: MediaWriter): Promise<MediaFile> {
    return this.run('save media file', () => {
      const attempt: { filePath?: string } = {}
      try {
        return this.db.transaction(() => {
          const session = this.sessions.getById(sessionId)
          if (!session) {
            throw configurationError(`session not found: ${sessionId}`, { code: 'session-not-found' })
          }
          if (session.endedAt !== null || session.status === 'completed') {
            throw turnRejectedError(sessionId, session.status === 'completed' ? 'invalid-status' : 'session-ending')
          }
          const sequence = this.media.nextSequence(sessionId, kind)
          const stored = writer.write(sequence)
          attempt.filePath = stored.filePath
          return this.media.create({
            id: randomUUID(),
            sessionId,
            kind,
            filePath: stored.filePath,
            sequence,
            sizeBytes: stored.sizeBytes,
            createdAt: Date.now(),
          })
        })()
      } catch (err) {
        if (attempt.filePath !== undefined) writer.discard(attempt.filePath)
        throw err
      }
    })
  }

  async getMediaFiles(sessionId: string, kind?: MediaKind): Promise<MediaFile[]> {
    return this.run('get media files', () => this.media.listBySession(sessionId, kind))
  }

  // ── Token usage ──

  async saveTokenUsage(row: TokenUsageRow): Promise<void> {
    return this.run('save token usage', () => this.usage.create(row))
  }

  async getTokenUsage(sessionId: string): Promise<TokenUsageRow[]> {
    return this.run('get token usage', () => this.usage.listBySession(sessionId))
  }

  async aggregateTokenUsage(sessionId: string): Promise<UsageAggregateRow[]> {
    return this.run('aggregate token usage', () => this.usage.aggregateByOperation(sessionId))
  }

  // ── Evaluation ──

  /** session_id 唯一键保证只写一次，重复写入返回 false */
  async saveEvaluation(report: EvaluationReport): Promise<boolean> {
    return this.run('save evaluation', () => this.evaluations.create(report))
  }

  async getEvaluation(sessionId: string): Promise<EvaluationReport | null> {
    return this.run('get evaluation', () => this.evaluations.getBySessionId(sessionId))
  }

  // ── Audit ──

  /** 审计日志同步写入，不重试也不再产生日志 */
  saveAuditLog(entry: AuditLogEntry): void {
    this.auditLogs.create(entry)
  }

  async getAuditLogs(sessionId: string): Promise<AuditLogEntry[]> {
    return this.run('get audit logs', () => this.auditLogs.listBySession(sessionId))
  }

  async healthCheck(): Promise<HealthStatus> {
    const startedAt = Date.now()
    try {
      await this.run('health check', () => this.db.prepare('SELECT 1').get())
      return { ok: true, latencyMs: Date.now() - startedAt }
    } catch (err) {
      log.error('数据库健康检查失败', { error: toMessage(err) })
      return { ok: false, latencyMs: Date.now() - startedAt, error: toMessage(err) }
    }
  }

  /** 候选人输入的前提：会话存在、为 active 且未进入结束流程 */
  private checkAcceptsInput(sessionId: string): TurnRejection | null {
    const session = this.sessions.getById(sessionId)
    if (!session) return 'session-not-found'
    if (session.endedAt !== null && session.status !== 'completed') return 'session-ending'
    if (session.status !== 'active') return 'invalid-status'
    return null
  }

  private insertMessage(id: string, input: NewMessage): Message {
    const last = this.messages.getLastTimestamp(input.sessionId) ?? 0
    const message: Message = {
      id,
      sessionId: input.sessionId,
      role: input.role,
      content: input.content,
      timestamp: Math.max(Date.now(), last),
    }
    this.messages.append(message)
    return message
  }

  private async run<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return await withRetry(this.policy, fn, {
        sleep: this.sleep,
        onRetry: (attempt, delayMs, err) => {
          log.warn('数据库操作重试', { operation, attempt, delayMs, error: toMessage(err) })
        },
      })
    } catch (err) {
      if (isPlatformError(err)) throw err
      if (err instanceof RetryExhaustedError) {
        log.error('数据库操作重试耗尽', { operation, attempts: err.attempts })
        throw dataStoreError(
          `database ${operation} failed after ${err.attempts} attempts: ${toMessage(err.lastError)}`,
          { code: 'retry-exhausted', cause: err.lastError }
        )
      }
      throw dataStoreError(`database ${operation} failed: ${toMessage(err)}`, { cause: err })
    }
  }
}

/** 写入被会话状态拒绝时的错误 */
export function turnRejectedError(sessionId: string, reason: TurnRejection): PlatformError {
  switch (reason) {
    case 'session-not-found':
      return configurationError(`session not found: ${sessionId}`, { code: 'session-not-found' })
    case 'session-ending':
      return configurationError(`session ${sessionId} is ending; no further input is accepted`, {
        code: 'session-ending',
      })
    case 'already-started':
      return configurationError(`interview for session ${sessionId} has already started`, { code: 'already-started' })
    case 'invalid-status':
      return configurationError(`session ${sessionId} does not accept input in its current status`, {
        code: 'invalid-status',
      })
  }
}
