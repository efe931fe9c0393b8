import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { COMPETENCIES } from '@shared/constants'
import { aiProviderError } from '../../errors'
import { createHarness, queueEvaluation, reply, TEXT_ONLY_CONFIG } from './helpers'
import type { Harness } from './helpers'

describe('EvaluationManager', () => {
  let h: Harness

  beforeEach(() => {
    h = createHarness()
  })

  afterEach(() => {
    h.cleanup()
  })

  async function activeSession(enabledModes = TEXT_ONLY_CONFIG.enabledModes) {
    const session = await h.sessions.createSession({ ...TEXT_ONLY_CONFIG, enabledModes })
    await h.sessions.startSession(session.id)
    return session
  }

  it('should run the four model steps in order and compute the score locally', async () => {
    const session = await activeSession()
    queueEvaluation(h.generate)

    const report = await h.evaluations.analyzeSession(session.id)

    expect(h.generate).toHaveBeenCalledTimes(4)
    for (const call of h.generate.mock.calls) {
      expect(call[0].temperature).toBe(0.3)
      expect(call[0].model).toBe('gpt-4-turbo-preview')
    }
    expect(report.overallScore).toBe(69)
    expect(Object.keys(report.competencyScores)).toEqual([...COMPETENCIES])
    expect(report.wentWell).toEqual([
      { description: 'Clear component breakdown', evidence: ['split into read and write paths'] },
    ])
    expect(report.communicationModeAnalysis).toEqual({ overallCommunication: 'Explained ideas in order' })
    expect(report.improvementPlan.concreteSteps).toEqual([
      { stepNumber: 1, description: 'Compare two storage engines for the same workload', resources: [] },
    ])
    expect(await h.evaluations.getEvaluation(session.id)).toBeNull()
  })

  it('should record usage under each step name', async () => {
    const session = await activeSession()
    queueEvaluation(h.generate)

    await h.evaluations.analyzeSession(session.id)

    const breakdown = await h.tokens.getUsageBreakdown(session.id)
    expect(breakdown.map((b) => [b.operation, b.inputTokens, b.outputTokens])).toEqual([
      ['analyze_communication', 600, 100],
      ['analyze_competencies', 1000, 200],
      ['generate_feedback', 800, 150],
      ['generate_improvement_plan', 500, 120],
    ])
  })

  it('should fall back on malformed step output', async () => {
    const session = await activeSession(['text', 'whiteboard'])
    h.generate
      .mockResolvedValueOnce(reply('scores unavailable'))
      .mockResolvedValueOnce(reply('no feedback'))
      .mockResolvedValueOnce(reply('n/a'))
      .mockResolvedValueOnce(reply('n/a'))

    const report = await h.evaluations.analyzeSession(session.id)

    expect(report.overallScore).toBe(50)
    expect(report.needsImprovement).toEqual([])
    expect(report.wentOkay).toHaveLength(COMPETENCIES.length)
    expect(report.communicationModeAnalysis).toEqual({
      overallCommunication: 'Limited use of communication modes',
      whiteboardUsage: 'Whiteboard enabled but no snapshots saved',
    })
    expect(report.improvementPlan.concreteSteps.map((s) => s.stepNumber)).toEqual([1, 2])
  })

  it('should name the failing step in the error', async () => {
    const session = await activeSession()
    h.generate
      .mockResolvedValueOnce(reply('{}'))
      .mockRejectedValueOnce(aiProviderError('language model provider openai is unavailable (HTTP 503)', 'unavailable'))

    await expect(h.evaluations.analyzeSession(session.id)).rejects.toMatchObject({
      kind: 'ai-provider',
      code: 'unavailable',
      message: expect.stringContaining('generate_feedback'),
    })
  })

  it('should treat empty output as unrecoverable', async () => {
    const session = await activeSession()
    h.generate.mockResolvedValueOnce(reply('   '))

    await expect(h.evaluations.analyzeSession(session.id)).rejects.toMatchObject({
      kind: 'ai-provider',
      code: 'malformed-output',
    })
    expect(h.generate).toHaveBeenCalledTimes(1)
  })

  it('should stop before the next step once cancelled', async () => {
    const session = await activeSession()
    const controller = new AbortController()
    h.generate.mockImplementationOnce(async () => {
      controller.abort()
      return reply('{}')
    })

    await expect(h.evaluations.analyzeSession(session.id, { signal: controller.signal })).rejects.toMatchObject({
      code: 'cancelled',
    })
    expect(h.generate).toHaveBeenCalledTimes(1)
    expect(await h.tokens.getUsageRecords(session.id)).toEqual([])
  })

  describe('generateEvaluation', () => {
    it('should refuse sessions that have not ended', async () => {
      const session = await activeSession()
      await expect(h.evaluations.generateEvaluation(session.id)).rejects.toMatchObject({
        kind: 'configuration',
        code: 'invalid-status',
      })
    })

    it('should return the stored report without calling the model again', async () => {
      const session = await activeSession()
      queueEvaluation(h.generate)
      const report = await h.sessions.endSession(session.id)

      expect(await h.evaluations.generateEvaluation(session.id)).toEqual(report)
      expect(h.generate).toHaveBeenCalledTimes(4)
    })
  })
})
