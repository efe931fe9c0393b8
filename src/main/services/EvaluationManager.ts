import { randomUUID } from 'crypto'
import type { ChatMessage, GenerateResult } from '@shared/types/llm'
import type { SamplingSettings } from '@shared/types/config'
import type { EvaluationReport } from '@shared/types/evaluation'
import type { MediaFile, Session } from '@shared/types/session'
import { COMPETENCIES, COMPETENCY_WEIGHTS } from '@shared/constants'
import type { DataStore } from '../db/DataStore'
import type { TokenTracker } from './TokenTracker'
import type { LLMClientFactory } from './AIInterviewer'
import {
  assessModesFromMedia,
  computeOverallScore,
  deriveFeedbackFromScores,
  parseCommunicationAnalysis,
  parseCompetencyScores,
  parseFeedback,
  parseImprovementPlan,
} from './evaluationParsers'
import {
  communicationPrompt,
  competencyPrompt,
  feedbackPrompt,
  formatTranscript,
  improvementPlanPrompt,
} from './evaluationPrompts'
import { aiProviderError, configurationError, isAIProviderErrorCode, isPlatformError, toMessage } from '../errors'
import type { AIProviderErrorCode } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('EvaluationManager')

export const DEFAULT_EVALUATION_SAMPLING: SamplingSettings = {
  temperature: 0.3,
  maxOutputTokens: 2000,
}

export interface AnalyzeOptions {
  /** 会话删除或取消时中止，已完成的步骤结果全部丢弃 */
  signal?: AbortSignal
}

interface StepContext {
  session: Session
  signal: AbortSignal | undefined
}

/**
 * 评估流水线：
 *   1. 能力评分      analyze_competencies
 *   2. 反馈分类      generate_feedback
 *   3. 沟通模式评估  analyze_communication
 *   4. 改进计划      generate_improvement_plan
 *   5. 综合分（本地加权计算）
 * 任一步模型调用失败则整体失败，不会保存部分结果。
 */
export class EvaluationManager {
  constructor(
    private dataStore: DataStore,
    private clientFor: LLMClientFactory,
    private tokenTracker: TokenTracker,
    private sampling: SamplingSettings = DEFAULT_EVALUATION_SAMPLING
  ) {}

  /** 已完成会话的评估报告：已有则直接返回，否则生成并保存（只生成一次） */
  async generateEvaluation(sessionId: string): Promise<EvaluationReport> {
    const session = await this.requireSession(sessionId)
    if (session.status !== 'completed') {
      throw configurationError(
        `session ${sessionId} is ${session.status}; evaluation is only available after the session ends`,
        { code: 'invalid-status' }
      )
    }

    const existing = await this.dataStore.getEvaluation(sessionId)
    if (existing) return existing

    const report = await this.analyzeSession(sessionId)
    const saved = await this.dataStore.saveEvaluation(report)
    if (!saved) {
      // 并发生成时以先写入者为准
      const stored = await this.dataStore.getEvaluation(sessionId)
      if (stored) return stored
    }
    return report
  }

  async getEvaluation(sessionId: string): Promise<EvaluationReport | null> {
    return this.dataStore.getEvaluation(sessionId)
  }

  /** 运行流水线并返回报告，不写入数据库 */
  async analyzeSession(sessionId: string, options: AnalyzeOptions = {}): Promise<EvaluationReport> {
    const session = await this.requireSession(sessionId)
    const ctx: StepContext = { session, signal: options.signal }
    const startedAt = Date.now()

    const [messages, mediaFiles] = await Promise.all([
      this.dataStore.getMessages(sessionId),
      this.dataStore.getMediaFiles(sessionId),
    ])
    const transcript = formatTranscript(messages)
    log.info('开始生成评估', { sessionId, messages: messages.length, media: mediaFiles.length })

    const competencyOutput = await this.runStep(ctx, 'analyze_competencies', competencyPrompt(transcript, COMPETENCIES))
    const competencyScores = parseCompetencyScores(competencyOutput.text, COMPETENCIES)

    const feedbackOutput = await this.runStep(ctx, 'generate_feedback', feedbackPrompt(transcript, competencyScores))
    const feedback = parseFeedback(feedbackOutput.text) ?? deriveFeedbackFromScores(competencyScores)

    const enabledModes = session.config.enabledModes
    const communicationOutput = await this.runStep(
      ctx,
      'analyze_communication',
      communicationPrompt(transcript, enabledModes, summarizeMedia(mediaFiles))
    )
    const communicationModeAnalysis = parseCommunicationAnalysis(
      communicationOutput.text,
      enabledModes,
      assessModesFromMedia(enabledModes, mediaFiles)
    )

    const planOutput = await this.runStep(
      ctx,
      'generate_improvement_plan',
      improvementPlanPrompt(competencyScores, feedback.needsImprovement)
    )
    const improvementPlan = parseImprovementPlan(planOutput.text, competencyScores)

    const overallScore = computeOverallScore(competencyScores, COMPETENCY_WEIGHTS)
    this.throwIfCancelled(ctx)

    log.info('评估生成完成', { sessionId, overallScore, elapsedMs: Date.now() - startedAt })
    return {
      id: randomUUID(),
      sessionId,
      overallScore,
      competencyScores,
      wentWell: feedback.wentWell,
      wentOkay: feedback.wentOkay,
      needsImprovement: feedback.needsImprovement,
      communicationModeAnalysis,
      improvementPlan,
      createdAt: Date.now(),
    }
  }

  /** 单步模型调用；失败时报出步骤名，输出为空视为不可恢复 */
  private async runStep(ctx: StepContext, step: string, messages: ChatMessage[]): Promise<GenerateResult> {
    this.throwIfCancelled(ctx)
    const { session } = ctx

    let result: GenerateResult
    try {
      result = await this.clientFor(session.config.aiProvider).generate({
        messages,
        model: session.config.aiModel,
        temperature: this.sampling.temperature,
        maxOutputTokens: this.sampling.maxOutputTokens,
        signal: ctx.signal,
      })
    } catch (err) {
      this.throwIfCancelled(ctx)
      log.error('评估步骤失败', { sessionId: session.id, step, error: toMessage(err) })
      if (isPlatformError(err, 'configuration')) throw err
      throw aiProviderError(`evaluation step ${step} failed: ${toMessage(err)}`, toProviderCode(err), { cause: err })
    }

    this.throwIfCancelled(ctx)
    if (!result.text.trim()) {
      throw aiProviderError(
        `evaluation step ${step} failed: language model provider ${session.config.aiProvider} returned empty output`,
        'malformed-output'
      )
    }

    await this.tokenTracker.recordUsage(session.id, step, result.inputTokens, result.outputTokens)
    return result
  }

  private throwIfCancelled(ctx: StepContext): void {
    if (ctx.signal?.aborted) {
      throw aiProviderError(`evaluation for session ${ctx.session.id} was cancelled`, 'cancelled')
    }
  }

  private async requireSession(sessionId: string): Promise<Session> {
    const session = await this.dataStore.getSession(sessionId)
    if (!session) {
      throw configurationError(`session not found: ${sessionId}`, { code: 'session-not-found' })
    }
    return session
  }
}

function toProviderCode(err: unknown): AIProviderErrorCode {
  if (isPlatformError(err, 'ai-provider') && isAIProviderErrorCode(err.code)) return err.code
  return 'transport'
}

function summarizeMedia(mediaFiles: readonly MediaFile[]): string {
  if (mediaFiles.length === 0) return 'none'
  const counts = new Map<string, number>()
  for (const media of mediaFiles) {
    counts.set(media.kind, (counts.get(media.kind) ?? 0) + 1)
  }
  return [...counts.entries()].map(([kind, count]) => `${count} ${kind}`).join(', ')
}
