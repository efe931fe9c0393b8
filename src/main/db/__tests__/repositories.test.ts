import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type Database from 'better-sqlite3'
import type { Session } from '@shared/types/session'
import type { EvaluationReport } from '@shared/types/evaluation'
import { createTestDatabase } from '../database'
import { SessionRepo } from '../repositories/SessionRepo'
import { MessageRepo } from '../repositories/MessageRepo'
import { MediaFileRepo } from '../repositories/MediaFileRepo'
import { TokenUsageRepo } from '../repositories/TokenUsageRepo'
import { EvaluationRepo } from '../repositories/EvaluationRepo'
import { ResumeRepo } from '../repositories/ResumeRepo'
import { AuditLogRepo } from '../repositories/AuditLogRepo'

function makeSession(id: string, overrides?: Partial<Session>): Session {
  return {
    id,
    userId: 'user-1',
    config: { enabledModes: ['text', 'whiteboard'], aiProvider: 'openai', aiModel: 'gpt-4' },
    status: 'created',
    activeModes: [],
    createdAt: 1_000,
    startedAt: null,
    endedAt: null,
    ...overrides,
  }
}

function makeReport(sessionId: string, overallScore: number): EvaluationReport {
  return {
    id: `eval-${sessionId}-${overallScore}`,
    sessionId,
    overallScore,
    competencyScores: { 'Data Modeling': { score: overallScore, confidenceLevel: 'high', evidence: ['tables'] } },
    wentWell: [],
    wentOkay: [],
    needsImprovement: [{ description: 'Capacity estimates', evidence: [] }],
    communicationModeAnalysis: { overallCommunication: 'Clear' },
    improvementPlan: { priorityAreas: ['Data Modeling'], concreteSteps: [], resources: [] },
    createdAt: 2_000,
  }
}

describe('SessionRepo', () => {
  let db: Database.Database
  let repo: SessionRepo

  beforeEach(() => {
    db = createTestDatabase()
    repo = new SessionRepo(db)
  })

  afterEach(() => {
    db.close()
  })

  it('should round-trip a session with its config', () => {
    const session = makeSession('s1', {
      config: {
        enabledModes: ['text'],
        aiProvider: 'anthropic',
        aiModel: 'claude-3-haiku-20240307',
        durationMinutes: 45,
        resumeData: { userId: 'user-1', yearsOfExperience: 4, domainExpertise: ['search'], experienceLevel: 'mid' },
      },
    })
    repo.create(session)

    expect(repo.getById('s1')).toEqual(session)
    expect(repo.getById('missing')).toBeNull()
  })

  it('should only transition from the expected status', () => {
    repo.create(makeSession('s1'))

    expect(repo.transition('s1', { from: ['active'], to: 'paused' })).toBe(false)
    expect(repo.transition('s1', { from: ['created'], to: 'active', startedAt: 5_000, activeModes: ['text'] })).toBe(true)

    const session = repo.getById('s1')
    expect(session?.status).toBe('active')
    expect(session?.startedAt).toBe(5_000)
    expect(session?.activeModes).toEqual(['text'])
  })

  it('should not change active modes of completed sessions', () => {
    repo.create(makeSession('s1', { status: 'completed' }))
    expect(repo.setActiveModes('s1', ['text'])).toBe(false)
  })

  it('should list with filters and pagination', () => {
    repo.create(makeSession('a', { createdAt: 1 }))
    repo.create(makeSession('b', { createdAt: 2, userId: 'user-2' }))
    repo.create(makeSession('c', { createdAt: 3, status: 'active' }))

    expect(repo.list().sessions.map((s) => s.id)).toEqual(['c', 'b', 'a'])
    expect(repo.list({ userId: 'user-1' }).total).toBe(2)
    expect(repo.list({ status: 'active' }).sessions.map((s) => s.id)).toEqual(['c'])

    const page = repo.list({ limit: 1, offset: 1 })
    expect(page.total).toBe(3)
    expect(page.sessions.map((s) => s.id)).toEqual(['b'])
  })

  it('should cascade deletes to child rows', () => {
    repo.create(makeSession('s1'))
    const messages = new MessageRepo(db)
    const media = new MediaFileRepo(db)
    const evaluations = new EvaluationRepo(db)
    messages.append({ id: 'm1', sessionId: 's1', role: 'interviewer', content: 'Hi', timestamp: 1 })
    media.create({
      id: 'f1',
      sessionId: 's1',
      kind: 'whiteboard',
      filePath: 's1/whiteboard/snapshot_001.png',
      sequence: 1,
      sizeBytes: 3,
      createdAt: 1,
    })
    evaluations.create(makeReport('s1', 70))

    expect(repo.delete('s1')).toBe(true)
    expect(messages.countBySession('s1')).toBe(0)
    expect(media.listBySession('s1')).toEqual([])
    expect(evaluations.getBySessionId('s1')).toBeNull()
    expect(repo.delete('s1')).toBe(false)
  })
})

describe('MessageRepo', () => {
  let db: Database.Database
  let repo: MessageRepo

  beforeEach(() => {
    db = createTestDatabase()
    new SessionRepo(db).create(makeSession('s1'))
    repo = new MessageRepo(db)
  })

  afterEach(() => {
    db.close()
  })

  it('should ignore a repeated id', () => {
    const message = { id: 'm1', sessionId: 's1', role: 'candidate' as const, content: 'Answer', timestamp: 10 }
    repo.append(message)
    repo.append({ ...message, content: 'Changed' })

    expect(repo.listBySession('s1')).toEqual([message])
  })

  it('should order by timestamp then insertion', () => {
    repo.append({ id: 'b', sessionId: 's1', role: 'candidate', content: 'second', timestamp: 10 })
    repo.append({ id: 'a', sessionId: 's1', role: 'interviewer', content: 'third', timestamp: 10 })
    repo.append({ id: 'c', sessionId: 's1', role: 'interviewer', content: 'first', timestamp: 5 })

    expect(repo.listBySession('s1').map((m) => m.content)).toEqual(['first', 'second', 'third'])
    expect(repo.getLastTimestamp('s1')).toBe(10)
    expect(repo.getLastTimestamp('other')).toBeNull()
  })
})

describe('MediaFileRepo', () => {
  let db: Database.Database
  let repo: MediaFileRepo

  beforeEach(() => {
    db = createTestDatabase()
    new SessionRepo(db).create(makeSession('s1'))
    repo = new MediaFileRepo(db)
  })

  afterEach(() => {
    db.close()
  })

  it('should count sequences per kind', () => {
    expect(repo.nextSequence('s1', 'whiteboard')).toBe(1)
    repo.create({ id: 'f1', sessionId: 's1', kind: 'whiteboard', filePath: 'a', sequence: 1, sizeBytes: 1, createdAt: 1 })

    expect(repo.nextSequence('s1', 'whiteboard')).toBe(2)
    expect(repo.nextSequence('s1', 'screen')).toBe(1)
  })

  it('should reject a duplicate sequence for the same kind', () => {
    repo.create({ id: 'f1', sessionId: 's1', kind: 'whiteboard', filePath: 'a', sequence: 1, sizeBytes: 1, createdAt: 1 })
    expect(() =>
      repo.create({ id: 'f2', sessionId: 's1', kind: 'whiteboard', filePath: 'b', sequence: 1, sizeBytes: 1, createdAt: 1 })
    ).toThrow(/UNIQUE/)
  })
})

describe('TokenUsageRepo', () => {
  let db: Database.Database
  let repo: TokenUsageRepo

  beforeEach(() => {
    db = createTestDatabase()
    new SessionRepo(db).create(makeSession('s1'))
    repo = new TokenUsageRepo(db)
  })

  afterEach(() => {
    db.close()
  })

  it('should aggregate per operation', () => {
    const base = { session_id: 's1', provider: 'openai', model: 'gpt-4', created_at: 1 }
    repo.create({ ...base, id: 'u1', operation: 'process_response', input_tokens: 10, output_tokens: 5, cost_micros: 600 })
    repo.create({ ...base, id: 'u2', operation: 'process_response', input_tokens: 20, output_tokens: 5, cost_micros: 900 })
    repo.create({ ...base, id: 'u3', operation: 'start_interview', input_tokens: 7, output_tokens: 3, cost_micros: 390 })
    repo.create({ ...base, id: 'u3', operation: 'start_interview', input_tokens: 7, output_tokens: 3, cost_micros: 390 })

    expect(repo.aggregateByOperation('s1')).toEqual([
      { operation: 'process_response', input_tokens: 30, output_tokens: 10, cost_micros: 1500, calls: 2 },
      { operation: 'start_interview', input_tokens: 7, output_tokens: 3, cost_micros: 390, calls: 1 },
    ])
    expect(repo.listBySession('s1')).toHaveLength(3)
  })
})

describe('EvaluationRepo', () => {
  let db: Database.Database
  let repo: EvaluationRepo

  beforeEach(() => {
    db = createTestDatabase()
    new SessionRepo(db).create(makeSession('s1', { status: 'completed' }))
    repo = new EvaluationRepo(db)
  })

  afterEach(() => {
    db.close()
  })

  it('should store one report per session', () => {
    const first = makeReport('s1', 70)
    expect(repo.create(first)).toBe(true)
    expect(repo.create(makeReport('s1', 90))).toBe(false)

    expect(repo.getBySessionId('s1')).toEqual(first)
  })
})

describe('ResumeRepo', () => {
  let db: Database.Database
  let repo: ResumeRepo

  beforeEach(() => {
    db = createTestDatabase()
    repo = new ResumeRepo(db)
  })

  afterEach(() => {
    db.close()
  })

  it('should overwrite the profile for the same user', () => {
    repo.upsert({ userId: 'u1', yearsOfExperience: 2, domainExpertise: ['web'], experienceLevel: 'junior' }, 1)
    repo.upsert(
      { userId: 'u1', name: 'Test Candidate', yearsOfExperience: 4, domainExpertise: ['web', 'data'], experienceLevel: 'mid' },
      2
    )

    expect(repo.getByUserId('u1')).toEqual({
      userId: 'u1',
      name: 'Test Candidate',
      experienceLevel: 'mid',
      yearsOfExperience: 4,
      domainExpertise: ['web', 'data'],
      skills: [],
    })
  })
})

describe('AuditLogRepo', () => {
  let db: Database.Database
  let repo: AuditLogRepo

  beforeEach(() => {
    db = createTestDatabase()
    repo = new AuditLogRepo(db)
  })

  afterEach(() => {
    db.close()
  })

  it('should keep entries without a session', () => {
    repo.create({ timestamp: 1, level: 'warn', scope: 'DataStore', message: 'retry', sessionId: 's1' })
    repo.create({ timestamp: 2, level: 'error', scope: 'LLMService', message: 'failed', sessionId: null })

    expect(repo.listBySession('s1').map((e) => e.message)).toEqual(['retry'])
    expect(db.prepare('SELECT COUNT(*) AS n FROM audit_logs WHERE session_id IS NULL').get()).toEqual({ n: 1 })
  })
})
