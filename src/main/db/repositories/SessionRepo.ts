import type Database from 'better-sqlite3'
import type { CommunicationMode, PerformanceIndicators, Session, SessionStatus } from '@shared/types/session'

export interface SessionListOptions {
  userId?: string
  status?: SessionStatus
  offset?: number
  limit?: number
}

export interface StatusTransition {
  from: SessionStatus[]
  to: SessionStatus
  startedAt?: number
  endedAt?: number
  activeModes?: CommunicationMode[]
  /** 仅在会话未进入结束流程（ended_at 为空）时更新 */
  requireOpen?: boolean
}

export class SessionRepo {
  constructor(private db: Database.Database) {}

  create(session: Session): Session {
    const { config } = session
    this.db
      .prepare(
        `INSERT INTO sessions (id, user_id, status, ai_provider, ai_model, enabled_modes, active_modes,
           resume_data, duration_minutes, created_at, started_at, ended_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        session.id,
        session.userId,
        session.status,
        config.aiProvider,
        config.aiModel,
        JSON.stringify(config.enabledModes),
        JSON.stringify(session.activeModes),
        config.resumeData ? JSON.stringify(config.resumeData) : null,
        config.durationMinutes ?? null,
        session.createdAt,
        session.startedAt,
        session.endedAt
      )
    return session
  }

  getById(id: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(id)

    return row ? this.toSession(row) : null
  }

  list(options: SessionListOptions = {}): { sessions: Session[]; total: number } {
    const { userId, status, offset = 0, limit = 50 } = options
    const conditions: string[] = []
    const params: unknown[] = []

    if (userId) {
      conditions.push('user_id = ?')
      params.push(userId)
    }
    if (status) {
      conditions.push('status = ?')
      params.push(status)
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : ''

    const countRow = this.db
      .prepare<unknown[], { count: number }>(`SELECT COUNT(*) as count FROM sessions ${where}`)
      .get(...params)

    const rows = this.db
      .prepare<unknown[], SessionRow>(
        `SELECT * FROM sessions ${where} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
      )
      .all(...params, limit, offset)

    return { sessions: rows.map((r) => this.toSession(r)), total: countRow?.count ?? 0 }
  }

  /** 仅当当前状态属于 from 时更新，返回是否成功 */
  transition(id: string, transition: StatusTransition): boolean {
    const fields = ['status = ?']
    const params: unknown[] = [transition.to]

    if (transition.startedAt !== undefined) {
      fields.push('started_at = ?')
      params.push(transition.startedAt)
    }
    if (transition.endedAt !== undefined) {
      fields.push('ended_at = ?')
      params.push(transition.endedAt)
    }
    if (transition.activeModes !== undefined) {
      fields.push('active_modes = ?')
      params.push(JSON.stringify(transition.activeModes))
    }

    const placeholders = transition.from.map(() => '?').join(', ')
    const openClause = transition.requireOpen ? ' AND ended_at IS NULL' : ''
    const result = this.db
      .prepare(`UPDATE sessions SET ${fields.join(', ')} WHERE id = ? AND status IN (${placeholders})${openClause}`)
      .run(...params, id, ...transition.from)
    return result.changes > 0
  }

  /**
   * 标记会话进入结束流程：写入 ended_at，状态不变。
   * 已在结束中或不是 active/paused 时返回 false
   */
  beginEnding(id: string, endedAt: number): boolean {
    const result = this.db
      .prepare(
        "UPDATE sessions SET ended_at = ? WHERE id = ? AND status IN ('active', 'paused') AND ended_at IS NULL"
      )
      .run(endedAt, id)
    return result.changes > 0
  }

  /** 撤销结束标记（评估失败时） */
  cancelEnding(id: string): boolean {
    const result = this.db
      .prepare("UPDATE sessions SET ended_at = NULL WHERE id = ? AND status != 'completed'")
      .run(id)
    return result.changes > 0
  }

  getPerformanceIndicators(id: string): PerformanceIndicators | null {
    const row = this.db
      .prepare<[string], { performance_indicators: string | null }>(
        'SELECT performance_indicators FROM sessions WHERE id = ?'
      )
      .get(id)
    return row?.performance_indicators ? JSON.parse(row.performance_indicators) : null
  }

  setPerformanceIndicators(id: string, indicators: PerformanceIndicators): boolean {
    const result = this.db
      .prepare('UPDATE sessions SET performance_indicators = ? WHERE id = ?')
      .run(JSON.stringify(indicators), id)
    return result.changes > 0
  }

  setActiveModes(id: string, modes: CommunicationMode[]): boolean {
    const result = this.db
      .prepare("UPDATE sessions SET active_modes = ? WHERE id = ? AND status != 'completed'")
      .run(JSON.stringify(modes), id)
    return result.changes > 0
  }

  delete(id: string): boolean {
    const result = this.db
      .prepare('DELETE FROM sessions WHERE id = ?')
      .run(id)
    return result.changes > 0
  }

  private toSession(row: SessionRow): Session {
    return {
      id: row.id,
      userId: row.user_id,
      config: {
        enabledModes: JSON.parse(row.enabled_modes),
        aiProvider: row.ai_provider,
        aiModel: row.ai_model,
        ...(row.resume_data ? { resumeData: JSON.parse(row.resume_data) } : {}),
        ...(row.duration_minutes !== null ? { durationMinutes: row.duration_minutes } : {}),
      },
      status: row.status,
      activeModes: JSON.parse(row.active_modes),
      createdAt: row.created_at,
      startedAt: row.started_at,
      endedAt: row.ended_at,
    }
  }
}

interface SessionRow {
  id: string
  user_id: string
  status: SessionStatus
  ai_provider: string
  ai_model: string
  enabled_modes: string
  active_modes: string
  resume_data: string | null
  duration_minutes: number | null
  created_at: number
  started_at: number | null
  ended_at: number | null
}
