import { randomUUID } from 'crypto'
import type { ModelPricing } from '@shared/types/llm'
import type { OperationUsage, TokenUsageRecord, UsageTotals } from '@shared/types/usage'
import type { Session } from '@shared/types/session'
import { LLM_PROVIDER_PRESETS } from '@shared/constants'
import type { DataStore } from '../db/DataStore'
import type { TokenUsageRow, UsageAggregateRow } from '../db/repositories/TokenUsageRepo'
import { configurationError } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('TokenTracker')

const MICROS_PER_DOLLAR = 1_000_000

/** 按 (provider, model) 查单价 */
export function findPricing(provider: string, model: string): ModelPricing | null {
  const preset = LLM_PROVIDER_PRESETS.find((p) => p.id === provider)
  return preset?.models.find((m) => m.model === model) ?? null
}

/**
 * 计算调用成本（微美元整数）。
 * 单价是美元 / 百万 token，所以 tokens × 单价 恰好是微美元。
 */
export function computeCostMicros(pricing: ModelPricing, inputTokens: number, outputTokens: number): number {
  return Math.round(inputTokens * pricing.inputPerMillion + outputTokens * pricing.outputPerMillion)
}

/**
 * 用量统计：每次模型调用追加一条记录；
 * 会话总量由分项聚合相加得到，二者始终一致。
 */
export class TokenTracker {
  constructor(private dataStore: DataStore) {}

  async recordUsage(
    sessionId: string,
    operation: string,
    inputTokens: number,
    outputTokens: number
  ): Promise<TokenUsageRecord> {
    assertTokenCounts(inputTokens, outputTokens)
    const session = await this.dataStore.getSession(sessionId)
    if (!session) {
      throw configurationError(`session not found: ${sessionId}`, { code: 'session-not-found' })
    }

    const row = this.buildUsageRow(session, operation, inputTokens, outputTokens)
    await this.dataStore.saveTokenUsage(row)

    log.debug('记录 token 用量', { sessionId, operation, inputTokens, outputTokens })
    return toRecord(row)
  }

  /**
   * 校验并计价，生成一条待写入的用量记录。
   * 调用方把它与业务数据放在同一事务中提交
   */
  buildUsageRow(session: Session, operation: string, inputTokens: number, outputTokens: number): TokenUsageRow {
    assertTokenCounts(inputTokens, outputTokens)
    const { aiProvider, aiModel } = session.config
    const pricing = findPricing(aiProvider, aiModel)
    if (!pricing) {
      throw configurationError(`no pricing for ${aiProvider}/${aiModel}`, { code: 'unknown-model' })
    }

    return {
      id: randomUUID(),
      session_id: session.id,
      operation,
      provider: aiProvider,
      model: aiModel,
      input_tokens: inputTokens,
      output_tokens: outputTokens,
      cost_micros: computeCostMicros(pricing, inputTokens, outputTokens),
      created_at: Date.now(),
    }
  }

  async getSessionUsage(sessionId: string): Promise<UsageTotals> {
    const breakdown = await this.getUsageBreakdown(sessionId)
    return sumTotals(breakdown)
  }

  async getUsageBreakdown(sessionId: string): Promise<OperationUsage[]> {
    const rows = await this.dataStore.aggregateTokenUsage(sessionId)
    return rows.map(toOperationUsage)
  }

  async getUsageRecords(sessionId: string): Promise<TokenUsageRecord[]> {
    const rows = await this.dataStore.getTokenUsage(sessionId)
    return rows.map(toRecord)
  }
}

function assertTokenCounts(inputTokens: number, outputTokens: number): void {
  if (!Number.isInteger(inputTokens) || !Number.isInteger(outputTokens) || inputTokens < 0 || outputTokens < 0) {
    throw configurationError(`token counts must be non-negative integers (got ${inputTokens}/${outputTokens})`)
  }
}

export function toRecord(row: TokenUsageRow): TokenUsageRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    operation: row.operation,
    provider: row.provider,
    model: row.model,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    totalTokens: row.input_tokens + row.output_tokens,
    cost: row.cost_micros / MICROS_PER_DOLLAR,
    createdAt: row.created_at,
  }
}

function toOperationUsage(row: UsageAggregateRow): OperationUsage {
  return {
    operation: row.operation,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    totalTokens: row.input_tokens + row.output_tokens,
    cost: row.cost_micros / MICROS_PER_DOLLAR,
    calls: row.calls,
  }
}

function sumTotals(breakdown: OperationUsage[]): UsageTotals {
  let inputTokens = 0
  let outputTokens = 0
  let costMicros = 0
  let calls = 0
  for (const item of breakdown) {
    inputTokens += item.inputTokens
    outputTokens += item.outputTokens
    costMicros += Math.round(item.cost * MICROS_PER_DOLLAR)
    calls += item.calls
  }
  return {
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
    cost: costMicros / MICROS_PER_DOLLAR,
    calls,
  }
}
