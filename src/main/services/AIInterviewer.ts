import type { ChatMessage, GenerateResult, LLMClient } from '@shared/types/llm'
import type { SamplingSettings } from '@shared/types/config'
import type { Message, PerformanceIndicators, Session, WhiteboardAnalysis } from '@shared/types/session'
import type { DataStore } from '../db/DataStore'
import { turnRejectedError } from '../db/DataStore'
import type { FileStorage } from '../storage/FileStorage'
import type { TokenTracker } from './TokenTracker'
import {
  buildClarifyingMessages,
  buildConversationMessages,
  buildOpeningMessages,
  buildWhiteboardMessages,
} from './interviewPrompts'
import { parseWhiteboardAnalysis } from './evaluationParsers'
import { validatePerformanceIndicators } from './validation'
import { aiProviderError, configurationError, isPlatformError, toMessage } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('AIInterviewer')

/** 按供应商取得模型客户端 */
export type LLMClientFactory = (providerId: string) => LLMClient

export const DEFAULT_INTERVIEWER_SAMPLING: SamplingSettings = {
  temperature: 0.7,
  maxOutputTokens: 2000,
}

/**
 * 面试对话驱动。组件本身不持有状态，对话全部保存在 conversation_messages 中。
 * 模型调用不重试：失败时不会出现面试官回复，已保存的候选人输入保留。
 * 面试官回复与该次调用的用量在同一事务中写入。
 */
export class AIInterviewer {
  constructor(
    private dataStore: DataStore,
    private tokenTracker: TokenTracker,
    private clientFor: LLMClientFactory,
    private storage: FileStorage,
    private sampling: SamplingSettings = DEFAULT_INTERVIEWER_SAMPLING
  ) {}

  async startInterview(sessionId: string): Promise<Message> {
    const session = await this.requireActiveSession(sessionId)
    if ((await this.dataStore.countMessages(sessionId)) > 0) {
      throw turnRejectedError(sessionId, 'already-started')
    }

    log.info('开始面试', { sessionId, resumeAware: Boolean(session.config.resumeData) })
    const result = await this.callProvider(session, 'start_interview', buildOpeningMessages(session.config.resumeData))
    return this.commitTurn(session, 'start_interview', result, { requireEmpty: true })
  }

  async processResponse(sessionId: string, candidateText: string): Promise<Message> {
    const content = candidateText.trim()
    if (!content) {
      throw configurationError('candidate response is empty', { code: 'empty-response' })
    }
    const session = await this.requireActiveSession(sessionId)

    // 先保存候选人输入，模型失败时也不会丢失
    await this.dataStore.appendMessage({ sessionId, role: 'candidate', content }, { requireActive: true })

    const history = await this.dataStore.getMessages(sessionId)
    const indicators = await this.dataStore.getPerformanceIndicators(sessionId)
    const result = await this.callProvider(session, 'process_response', buildConversationMessages(history, indicators))
    return this.commitTurn(session, 'process_response', result)
  }

  /** 针对候选人最近一次回答追问澄清问题 */
  async askClarifyingQuestion(sessionId: string): Promise<Message> {
    const session = await this.requireActiveSession(sessionId)
    const history = await this.dataStore.getMessages(sessionId)
    if (history[history.length - 1]?.role !== 'candidate') {
      throw configurationError(`session ${sessionId} has no candidate response to clarify`, {
        code: 'no-candidate-response',
      })
    }

    const indicators = await this.dataStore.getPerformanceIndicators(sessionId)
    const result = await this.callProvider(
      session,
      'ask_clarifying_question',
      buildClarifyingMessages(history, indicators)
    )
    return this.commitTurn(session, 'ask_clarifying_question', result)
  }

  /** 保存表现指标；之后的提问附带对应的难度说明 */
  async adaptDifficulty(sessionId: string, indicators: PerformanceIndicators): Promise<PerformanceIndicators> {
    const valid = validatePerformanceIndicators(indicators)
    await this.requireActiveSession(sessionId)
    await this.dataStore.savePerformanceIndicators(sessionId, valid)
    log.info('调整提问难度', { sessionId, ...valid })
    return valid
  }

  /** 分析一张白板快照；会话结束后仍可调用 */
  async analyzeWhiteboard(sessionId: string, sequence: number): Promise<WhiteboardAnalysis> {
    const session = await this.requireSession(sessionId)
    const snapshots = await this.dataStore.getMediaFiles(sessionId, 'whiteboard')
    const snapshot = snapshots.find((media) => media.sequence === sequence)
    if (!snapshot) {
      throw configurationError(`whiteboard snapshot ${sequence} not found for session ${sessionId}`, {
        code: 'media-not-found',
      })
    }

    const imageUrl = `data:image/png;base64,${this.storage.read(snapshot.filePath).toString('base64')}`
    const result = await this.callProvider(session, 'analyze_whiteboard', buildWhiteboardMessages(sequence, imageUrl))
    await this.tokenTracker.recordUsage(sessionId, 'analyze_whiteboard', result.inputTokens, result.outputTokens)

    const analysis = parseWhiteboardAnalysis(result.text)
    if (!analysis) {
      throw aiProviderError(
        `language model provider ${session.config.aiProvider} returned no JSON for whiteboard snapshot ${sequence}`,
        'malformed-output'
      )
    }
    log.info('白板分析完成', { sessionId, sequence, components: analysis.componentsIdentified.length })
    return { sequence, filePath: snapshot.filePath, ...analysis }
  }

  async getConversationHistory(sessionId: string): Promise<Message[]> {
    return this.dataStore.getMessages(sessionId)
  }

  /** 回复与用量一起提交；回复被拒绝时用量仍然保留 */
  private async commitTurn(
    session: Session,
    operation: string,
    result: GenerateResult,
    options: { requireEmpty?: boolean } = {}
  ): Promise<Message> {
    const usage = this.tokenTracker.buildUsageRow(session, operation, result.inputTokens, result.outputTokens)
    const turn = await this.dataStore.appendInterviewerTurn(
      { sessionId: session.id, content: result.text.trim() },
      usage,
      options
    )
    if (turn.message === null) {
      log.warn('面试官回复未写入', { sessionId: session.id, operation, reason: turn.rejected })
      throw turnRejectedError(session.id, turn.rejected)
    }
    return turn.message
  }

  private async callProvider(session: Session, operation: string, messages: ChatMessage[]): Promise<GenerateResult> {
    const { aiProvider, aiModel } = session.config
    let result: GenerateResult
    try {
      result = await this.clientFor(aiProvider).generate({
        messages,
        model: aiModel,
        temperature: this.sampling.temperature,
        maxOutputTokens: this.sampling.maxOutputTokens,
      })
    } catch (err) {
      log.error('模型调用失败', { sessionId: session.id, operation, error: toMessage(err) })
      if (isPlatformError(err)) throw err
      throw aiProviderError(
        `language model provider ${aiProvider} failed during ${operation}: ${toMessage(err)}`,
        'transport',
        { cause: err }
      )
    }

    if (!result.text.trim()) {
      throw aiProviderError(`language model provider ${aiProvider} returned empty output during ${operation}`, 'malformed-output')
    }
    return result
  }

  private async requireActiveSession(sessionId: string): Promise<Session> {
    const session = await this.requireSession(sessionId)
    if (session.status !== 'active') {
      throw configurationError(`session ${sessionId} is ${session.status}; the interview requires an active session`, {
        code: 'invalid-status',
      })
    }
    if (session.endedAt !== null) {
      throw turnRejectedError(sessionId, 'session-ending')
    }
    return session
  }

  private async requireSession(sessionId: string): Promise<Session> {
    const session = await this.dataStore.getSession(sessionId)
    if (!session) {
      throw configurationError(`session not found: ${sessionId}`, { code: 'session-not-found' })
    }
    return session
  }
}
