import { randomUUID } from 'crypto'
import type { EvaluationReport } from '@shared/types/evaluation'
import type { Message, Session, SessionConfig, SessionStatus, SessionSummary } from '@shared/types/session'
import type { DataStore } from '../db/DataStore'
import type { SessionListOptions } from '../db/repositories/SessionRepo'
import type { FileStorage } from '../storage/FileStorage'
import type { EvaluationManager } from './EvaluationManager'
import { validateSessionConfig } from './validation'
import { buildSessionHeadline, sessionDurationMinutes } from './sessionSummary'
import { configurationError, toMessage } from '../errors'
import type { PlatformError } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('SessionManager')

const ENDABLE_STATUSES: SessionStatus[] = ['active', 'paused']

export interface SessionManagerOptions {
  /** listSessions 默认分页大小 */
  pageSize?: number
}

/**
 * 会话生命周期：created → active ⇄ paused → completed。
 * 状态变更都是数据库上的比较并交换，结束会话时评估报告与状态在同一事务提交。
 */
export class SessionManager {
  private ending = new Map<string, AbortController>()
  private pageSize: number

  constructor(
    private dataStore: DataStore,
    private evaluationManager: EvaluationManager,
    private storage: FileStorage,
    options: SessionManagerOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 50
  }

  async createSession(input: SessionConfig): Promise<Session> {
    const config = validateSessionConfig(input)
    const id = randomUUID()
    const session: Session = {
      id,
      userId: config.resumeData?.userId ?? `user_${id.slice(0, 8)}`,
      config,
      status: 'created',
      activeModes: [],
      createdAt: Date.now(),
      startedAt: null,
      endedAt: null,
    }

    await this.dataStore.createSession(session, config.resumeData)
    log.info('创建会话', { sessionId: id, modes: config.enabledModes, provider: config.aiProvider, model: config.aiModel })
    return session
  }

  async startSession(id: string): Promise<Session> {
    const session = await this.requireSession(id)
    await this.transition(session, {
      from: ['created'],
      to: 'active',
      startedAt: Date.now(),
      activeModes: [...session.config.enabledModes],
    })
    log.info('会话开始', { sessionId: id })
    return this.requireSession(id)
  }

  async pauseSession(id: string): Promise<Session> {
    const session = await this.requireSession(id)
    await this.transition(session, { from: ['active'], to: 'paused' })
    log.info('会话暂停', { sessionId: id })
    return this.requireSession(id)
  }

  async resumeSession(id: string): Promise<Session> {
    const session = await this.requireSession(id)
    await this.transition(session, { from: ['paused'], to: 'active' })
    log.info('会话恢复', { sessionId: id })
    return this.requireSession(id)
  }

  /**
   * 结束会话并生成评估。先写入 ended_at 标记，之后不再接受候选人输入与媒体；
   * 评估全部成功后状态变更和报告在同一事务提交。
   * 评估失败时撤销标记，会话保持原状态，可以重新结束。
   */
  async endSession(id: string): Promise<EvaluationReport> {
    if (this.ending.has(id)) {
      throw configurationError(`session ${id} has already ended or is ending`, { code: 'already-ended' })
    }
    const controller = new AbortController()
    this.ending.set(id, controller)

    try {
      const endedAt = Date.now()
      if (!(await this.dataStore.beginEnding(id, endedAt))) {
        throw await this.endRefusal(id)
      }
      log.info('会话进入结束流程', { sessionId: id })

      let report: EvaluationReport
      try {
        report = await this.evaluationManager.analyzeSession(id, { signal: controller.signal })
      } catch (err) {
        await this.reopenAfterFailedEnd(id, err)
        throw err
      }

      const completed = await this.dataStore.completeSession(
        id,
        { from: ENDABLE_STATUSES, endedAt, activeModes: [] },
        report
      )
      if (!completed) {
        throw configurationError(`session ${id} has already ended or was deleted`, { code: 'already-ended' })
      }

      log.info('会话结束', { sessionId: id, overallScore: report.overallScore })
      return report
    } finally {
      this.ending.delete(id)
    }
  }

  async getSession(id: string): Promise<Session | null> {
    return this.dataStore.getSession(id)
  }

  async listSessions(options: SessionListOptions = {}): Promise<{ sessions: Session[]; total: number }> {
    return this.dataStore.listSessions({ limit: this.pageSize, ...options })
  }

  /** 历史列表：附带时长、分数和标题 */
  async listSessionSummaries(options: SessionListOptions = {}): Promise<{ sessions: SessionSummary[]; total: number }> {
    const { sessions, total } = await this.listSessions(options)
    const summaries = await Promise.all(sessions.map((session) => this.summarize(session)))
    return { sessions: summaries, total }
  }

  async getEvaluation(id: string): Promise<EvaluationReport | null> {
    return this.dataStore.getEvaluation(id)
  }

  async getConversation(id: string): Promise<Message[]> {
    return this.dataStore.getMessages(id)
  }

  /** 删除会话：中止进行中的评估，级联删除记录与媒体目录 */
  async deleteSession(id: string): Promise<boolean> {
    const inFlight = this.ending.get(id)
    if (inFlight) {
      log.warn('删除会话时中止进行中的评估', { sessionId: id })
      inFlight.abort()
    }

    const deleted = await this.dataStore.deleteSession(id)
    this.storage.removeSession(id)
    if (deleted) log.info('删除会话', { sessionId: id })
    return deleted
  }

  private async summarize(session: Session): Promise<SessionSummary> {
    const evaluation = session.status === 'completed' ? await this.dataStore.getEvaluation(session.id) : null
    const messages = evaluation ? [] : await this.dataStore.getMessages(session.id)
    return {
      id: session.id,
      userId: session.userId,
      status: session.status,
      createdAt: session.createdAt,
      durationMinutes: sessionDurationMinutes(session.startedAt, session.endedAt),
      overallScore: evaluation?.overallScore ?? null,
      headline: buildSessionHeadline({
        overallScore: evaluation?.overallScore ?? null,
        priorityAreas: evaluation?.improvementPlan.priorityAreas,
        messages,
      }),
    }
  }

  private async transition(
    session: Session,
    change: { from: SessionStatus[]; to: SessionStatus; startedAt?: number; activeModes?: Session['activeModes'] }
  ): Promise<void> {
    assertTransition(session, change.from, change.to)
    const moved = await this.dataStore.transitionSession(session.id, { ...change, requireOpen: true })
    if (!moved) {
      // 读取与更新之间状态已被其他调用改变
      const current = await this.requireSession(session.id)
      assertTransition(current, change.from, change.to)
      throw invalidTransition(session.id, current.status, change.to)
    }
  }

  /** beginEnding 失败时给出原因 */
  private async endRefusal(id: string): Promise<PlatformError> {
    const session = await this.requireSession(id)
    if (session.status === 'completed' || session.endedAt !== null) {
      return configurationError(`session ${id} has already ended or is ending`, { code: 'already-ended' })
    }
    return configurationError(`session ${id} is ${session.status}; only active or paused sessions can end`, {
      code: 'invalid-status',
    })
  }

  private async reopenAfterFailedEnd(id: string, cause: unknown): Promise<void> {
    log.warn('评估失败，会话恢复为可结束状态', { sessionId: id, error: toMessage(cause) })
    try {
      await this.dataStore.cancelEnding(id)
    } catch (err) {
      log.error('撤销结束标记失败', { sessionId: id, error: toMessage(err) })
    }
  }

  private async requireSession(id: string): Promise<Session> {
    const session = await this.dataStore.getSession(id)
    if (!session) {
      throw configurationError(`session not found: ${id}`, { code: 'session-not-found' })
    }
    return session
  }
}

function assertTransition(session: Session, from: SessionStatus[], to: SessionStatus): void {
  if (session.endedAt !== null && session.status !== 'completed') {
    throw configurationError(`session ${session.id} is ending; it cannot move to ${to}`, { code: 'session-ending' })
  }
  if (!from.includes(session.status)) {
    throw invalidTransition(session.id, session.status, to)
  }
}

function invalidTransition(id: string, from: SessionStatus, to: SessionStatus) {
  return configurationError(`session ${id} cannot move from ${from} to ${to}`, { code: 'invalid-status' })
}
