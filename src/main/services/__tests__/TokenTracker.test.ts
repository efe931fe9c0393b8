import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { computeCostMicros, findPricing } from '../TokenTracker'
import { createHarness } from './helpers'
import type { Harness } from './helpers'

describe('pricing', () => {
  it('should look up presets by provider and model', () => {
    expect(findPricing('anthropic', 'claude-3-sonnet-20240229')).toEqual({
      model: 'claude-3-sonnet-20240229',
      inputPerMillion: 3,
      outputPerMillion: 15,
    })
    expect(findPricing('openai', 'claude-3-sonnet-20240229')).toBeNull()
    expect(findPricing('unknown', 'gpt-4')).toBeNull()
  })

  it('should price tokens in whole micro-dollars', () => {
    const pricing = { model: 'gpt-3.5-turbo', inputPerMillion: 0.5, outputPerMillion: 1.5 }
    expect(computeCostMicros(pricing, 1_000, 1_000)).toBe(2_000)
    expect(computeCostMicros(pricing, 3, 0)).toBe(2)
  })
})

describe('TokenTracker', () => {
  let h: Harness
  let sessionId: string

  beforeEach(async () => {
    h = createHarness()
    const session = await h.sessions.createSession({ enabledModes: ['text'], aiProvider: 'openai', aiModel: 'gpt-4' })
    sessionId = session.id
  })

  afterEach(() => {
    h.cleanup()
  })

  it('should price a call with the session model', async () => {
    const record = await h.tokens.recordUsage(sessionId, 'start_interview', 1_000, 500)

    expect(record).toMatchObject({
      operation: 'start_interview',
      provider: 'openai',
      model: 'gpt-4',
      inputTokens: 1_000,
      outputTokens: 500,
      totalTokens: 1_500,
      cost: 0.06,
    })
  })

  it('should keep the breakdown in step with the total', async () => {
    await h.tokens.recordUsage(sessionId, 'start_interview', 1_000, 500)
    await h.tokens.recordUsage(sessionId, 'process_response', 1_234, 321)
    await h.tokens.recordUsage(sessionId, 'process_response', 777, 3)

    const total = await h.tokens.getSessionUsage(sessionId)
    const breakdown = await h.tokens.getUsageBreakdown(sessionId)

    expect(total).toEqual({ inputTokens: 3_011, outputTokens: 824, totalTokens: 3_835, cost: 0.13977, calls: 3 })
    expect(breakdown.reduce((sum, b) => sum + b.inputTokens, 0)).toBe(total.inputTokens)
    expect(breakdown.reduce((sum, b) => sum + b.outputTokens, 0)).toBe(total.outputTokens)
    expect(breakdown.reduce((sum, b) => sum + b.calls, 0)).toBe(total.calls)
    expect(breakdown.find((b) => b.operation === 'process_response')).toMatchObject({ calls: 2, inputTokens: 2_011 })
  })

  it('should build a priced row without writing it', async () => {
    const session = await h.sessions.createSession({ enabledModes: ['text'], aiProvider: 'openai', aiModel: 'gpt-4' })

    const row = h.tokens.buildUsageRow(session, 'analyze_whiteboard', 2_000, 100)

    expect(row).toMatchObject({
      session_id: session.id,
      operation: 'analyze_whiteboard',
      provider: 'openai',
      model: 'gpt-4',
      input_tokens: 2_000,
      output_tokens: 100,
      cost_micros: 66_000,
    })
    expect(await h.tokens.getUsageRecords(session.id)).toEqual([])
    expect(() => h.tokens.buildUsageRow(session, 'analyze_whiteboard', 1.5, 0)).toThrow(/non-negative integers/)
  })

  it('should report zero usage for a quiet session', async () => {
    expect(await h.tokens.getSessionUsage(sessionId)).toEqual({
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
      cost: 0,
      calls: 0,
    })
  })

  it('should reject negative or fractional counts', async () => {
    await expect(h.tokens.recordUsage(sessionId, 'start_interview', -1, 0)).rejects.toMatchObject({
      kind: 'configuration',
    })
    await expect(h.tokens.recordUsage(sessionId, 'start_interview', 1.5, 0)).rejects.toMatchObject({
      kind: 'configuration',
    })
    expect(await h.tokens.getUsageRecords(sessionId)).toEqual([])
  })

  it('should reject unknown sessions', async () => {
    await expect(h.tokens.recordUsage('missing', 'start_interview', 1, 1)).rejects.toMatchObject({
      code: 'session-not-found',
    })
  })
})
