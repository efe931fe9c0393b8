import { vi } from 'vitest'
import { mkdtempSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import type Database from 'better-sqlite3'
import type { GenerateRequest, GenerateResult, LLMClient } from '@shared/types/llm'
import type { SessionConfig } from '@shared/types/session'
import { createTestDatabase } from '../../db/database'
import { DataStore } from '../../db/DataStore'
import { FileStorage } from '../../storage/FileStorage'
import { TokenTracker } from '../TokenTracker'
import { AIInterviewer } from '../AIInterviewer'
import { EvaluationManager } from '../EvaluationManager'
import { CommunicationManager } from '../CommunicationManager'
import { SessionManager } from '../SessionManager'

export function reply(text: string, inputTokens: number = 100, outputTokens: number = 50): GenerateResult {
  return { text, inputTokens, outputTokens }
}

/** 可编排的模型客户端 */
export function createFakeClient() {
  const generate = vi.fn<(request: GenerateRequest) => Promise<GenerateResult>>()
  const client: LLMClient = { generate }
  return { client, generate }
}

export const TEXT_ONLY_CONFIG: SessionConfig = {
  enabledModes: ['text'],
  aiProvider: 'openai',
  aiModel: 'gpt-4-turbo-preview',
}

export const COMPETENCY_JSON = JSON.stringify({
  'Problem Decomposition': { score: 80, confidence_level: 'high', evidence: ['split into read and write paths'] },
  'Scalability Considerations': { score: 70, confidence_level: 'medium', evidence: ['add a cache in front'] },
  'Reliability & Fault Tolerance': { score: 60, confidence_level: 'medium', evidence: [] },
  'Data Modeling': { score: 90, confidence_level: 'high', evidence: ['key-value table'] },
  'Trade-off Analysis': { score: 40, confidence_level: 'low', evidence: [] },
  'Communication Clarity': { score: 75, confidence_level: 'high', evidence: [] },
  'System Design Patterns': { score: 50, confidence_level: 'medium', evidence: [] },
})

export const FEEDBACK_JSON = JSON.stringify({
  went_well: [{ description: 'Clear component breakdown', evidence: ['split into read and write paths'] }],
  went_okay: [{ description: 'Caching discussed briefly', evidence: [] }],
  needs_improvement: [{ description: 'Trade-offs left implicit', evidence: [] }],
})

export const COMMUNICATION_JSON = JSON.stringify({
  overall_communication: 'Explained ideas in order',
})

export const PLAN_JSON = JSON.stringify({
  priority_areas: ['Trade-off Analysis'],
  concrete_steps: [{ description: 'Compare two storage engines for the same workload', resources: [] }],
  resources: ['Designing Data-Intensive Applications'],
})

/** 四个评估步骤依次返回的输出 */
export function queueEvaluation(generate: ReturnType<typeof createFakeClient>['generate']): void {
  generate
    .mockResolvedValueOnce(reply(COMPETENCY_JSON, 1000, 200))
    .mockResolvedValueOnce(reply(FEEDBACK_JSON, 800, 150))
    .mockResolvedValueOnce(reply(COMMUNICATION_JSON, 600, 100))
    .mockResolvedValueOnce(reply(PLAN_JSON, 500, 120))
}

export interface Harness {
  db: Database.Database
  dataStore: DataStore
  storage: FileStorage
  storageDir: string
  tokens: TokenTracker
  interviewer: AIInterviewer
  evaluations: EvaluationManager
  communication: CommunicationManager
  sessions: SessionManager
  generate: ReturnType<typeof createFakeClient>['generate']
  cleanup(): void
}

/** 内存数据库 + 临时目录 + 假模型客户端 */
export function createHarness(): Harness {
  const db = createTestDatabase()
  const dataStore = new DataStore(db, { sleep: async () => {} })
  const storageDir = mkdtempSync(join(tmpdir(), 'interview-media-'))
  const storage = new FileStorage(storageDir)
  const { client, generate } = createFakeClient()
  const clientFor = () => client
  const tokens = new TokenTracker(dataStore)
  const evaluations = new EvaluationManager(dataStore, clientFor, tokens)

  return {
    db,
    dataStore,
    storage,
    storageDir,
    tokens,
    interviewer: new AIInterviewer(dataStore, tokens, clientFor, storage),
    evaluations,
    communication: new CommunicationManager(dataStore, storage),
    sessions: new SessionManager(dataStore, evaluations, storage),
    generate,
    cleanup() {
      db.close()
      rmSync(storageDir, { recursive: true, force: true })
    },
  }
}
