import { z } from 'zod'
import type {
  ActionItem,
  CommunicationModeAnalysis,
  CompetencyScore,
  FeedbackItem,
  FeedbackSet,
  ImprovementPlan,
} from '@shared/types/evaluation'
import type { CommunicationMode, MediaFile, WhiteboardAnalysis } from '@shared/types/session'

/*
 * 模型输出解析。每个字段一个回退值：
 *   score            缺失或非数字 → 50；数字或数字字符串截断到 [0, 100]
 *   confidence_level 缺失或非法 → low
 *   evidence         缺失或非法 → []，单个字符串视为一条
 *   feedback item    缺少 description 的条目丢弃；全部无效时按分数推导
 *   mode assessment  缺失 → 按媒体数量推导
 *   priority_areas   缺失 → 分数最低的三项
 *   concrete_steps   缺失 → 默认两步；有效步骤按顺序重新编号
 *   resources        缺失 → 默认资料
 */

export const FALLBACK_SCORE = 50
export const FALLBACK_CONFIDENCE = 'low'

export const DEFAULT_ACTION_ITEMS: ActionItem[] = [
  {
    stepNumber: 1,
    description: 'Review system design fundamentals',
    resources: ['System Design Primer', 'Designing Data-Intensive Applications'],
  },
  {
    stepNumber: 2,
    description: 'Practice with mock interviews',
    resources: ['Pramp', 'interviewing.io'],
  },
]

export const DEFAULT_PLAN_RESOURCES = ['System Design Interview by Alex Xu']

const WENT_WELL_THRESHOLD = 75
const WENT_OKAY_THRESHOLD = 50

const textList = z
  .preprocess((value) => (typeof value === 'string' ? [value] : value), z.array(z.unknown()))
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )

const scoreField = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite())
  .transform(clampScore)
  .catch(FALLBACK_SCORE)

const confidenceField = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['low', 'medium', 'high']))
  .catch(FALLBACK_CONFIDENCE)

const evidenceField = textList.catch([])

const feedbackItemSchema = z.union([
  z.string().trim().min(1).transform((description): FeedbackItem => ({ description, evidence: [] })),
  z
    .object({
      description: z.string().trim().min(1),
      evidence: evidenceField.optional(),
    })
    .transform((item): FeedbackItem => ({ description: item.description, evidence: item.evidence ?? [] })),
])

const optionalText = z.string().trim().min(1).optional().catch(undefined)

export function clampScore(score: number): number {
  return Math.min(100, Math.max(0, Math.round(score * 100) / 100))
}

/**
 * 从模型输出中取出第一个 JSON 对象（兼容 ```json 代码块与前后说明文字）
 */
export function extractJSONObject(text: string): Record<string, unknown> | null {
  const jsonMatch = text.match(/\{[\s\S]*\}/)
  if (!jsonMatch) return null

  try {
    const parsed: unknown = JSON.parse(jsonMatch[0])
    return isRecord(parsed) ? parsed : null
  } catch {
    return null
  }
}

/** 能力评分：每个能力项都会有结果，缺失字段按回退值填充 */
export function parseCompetencyScores(text: string, competencies: readonly string[]): Record<string, CompetencyScore> {
  const parsed: Record<string, unknown> = extractJSONObject(text) ?? {}
  const container = isRecord(parsed.competencies) ? parsed.competencies : parsed
  const byName = indexByNormalizedKey(container)

  const result: Record<string, CompetencyScore> = {}
  for (const name of competencies) {
    const raw = byName.get(normalizeKey(name))
    const entry: Record<string, unknown> = isRecord(raw) ? raw : {}
    result[name] = {
      score: scoreField.parse(entry.score),
      confidenceLevel: confidenceField.parse(entry.confidence_level ?? entry.confidenceLevel ?? entry.confidence),
      evidence: evidenceField.parse(entry.evidence),
    }
  }
  return result
}

/** 反馈分类；没有任何有效条目时返回 null */
export function parseFeedback(text: string): FeedbackSet | null {
  const parsed = extractJSONObject(text)
  if (!parsed) return null

  const feedback: FeedbackSet = {
    wentWell: parseFeedbackList(parsed.went_well ?? parsed.wentWell),
    wentOkay: parseFeedbackList(parsed.went_okay ?? parsed.wentOkay),
    needsImprovement: parseFeedbackList(parsed.needs_improvement ?? parsed.needsImprovement),
  }

  const total = feedback.wentWell.length + feedback.wentOkay.length + feedback.needsImprovement.length
  return total > 0 ? feedback : null
}

/** 按分数推导反馈：≥75 表现好，50-74 一般，<50 需改进 */
export function deriveFeedbackFromScores(scores: Record<string, CompetencyScore>): FeedbackSet {
  const feedback: FeedbackSet = { wentWell: [], wentOkay: [], needsImprovement: [] }
  for (const [name, competency] of Object.entries(scores)) {
    const item: FeedbackItem = {
      description: `${name}: scored ${competency.score}/100`,
      evidence: [...competency.evidence],
    }
    if (competency.score >= WENT_WELL_THRESHOLD) {
      feedback.wentWell.push(item)
    } else if (competency.score >= WENT_OKAY_THRESHOLD) {
      feedback.wentOkay.push(item)
    } else {
      feedback.needsImprovement.push(item)
    }
  }
  return feedback
}

/** 按媒体数量给出各模式评估（仅启用的模式） */
export function assessModesFromMedia(
  enabledModes: readonly CommunicationMode[],
  mediaFiles: readonly MediaFile[]
): CommunicationModeAnalysis {
  const counts = { whiteboard: 0, screen: 0, audio: 0, video: 0 }
  for (const media of mediaFiles) {
    counts[media.kind] += 1
  }

  const analysis: CommunicationModeAnalysis = { overallCommunication: '' }

  if (enabledModes.includes('audio')) {
    analysis.audioQuality = counts.audio > 0
      ? `Good - ${counts.audio} audio recordings captured`
      : 'No audio recordings found'
  }
  if (enabledModes.includes('video')) {
    analysis.videoPresence = counts.video > 0
      ? `Present - ${counts.video} video recordings`
      : 'Video enabled but no recordings found'
  }
  if (enabledModes.includes('whiteboard')) {
    if (counts.whiteboard > 5) {
      analysis.whiteboardUsage = `Excellent - ${counts.whiteboard} snapshots showing active diagram work`
    } else if (counts.whiteboard > 0) {
      analysis.whiteboardUsage = `Good - ${counts.whiteboard} snapshots captured`
    } else {
      analysis.whiteboardUsage = 'Whiteboard enabled but no snapshots saved'
    }
  }
  if (enabledModes.includes('screen_share')) {
    analysis.screenShareUsage = counts.screen > 0
      ? `Used - ${counts.screen} screen captures`
      : 'Screen share enabled but not used'
  }

  const total = mediaFiles.length
  if (total > 10) {
    analysis.overallCommunication = 'Excellent use of multiple communication modes'
  } else if (total > 5) {
    analysis.overallCommunication = 'Good use of communication modes'
  } else if (total > 0) {
    analysis.overallCommunication = 'Basic use of communication modes'
  } else {
    analysis.overallCommunication = 'Limited use of communication modes'
  }
  return analysis
}

/**
 * 沟通模式评估：模型给出的字段优先，缺失时使用 fallback；
 * 未启用的模式不出现在结果中。
 */
export function parseCommunicationAnalysis(
  text: string,
  enabledModes: readonly CommunicationMode[],
  fallback: CommunicationModeAnalysis
): CommunicationModeAnalysis {
  const parsed: Record<string, unknown> = extractJSONObject(text) ?? {}
  const analysis: CommunicationModeAnalysis = {
    overallCommunication:
      optionalText.parse(parsed.overall_communication ?? parsed.overallCommunication) ?? fallback.overallCommunication,
  }

  if (enabledModes.includes('audio')) {
    analysis.audioQuality = optionalText.parse(parsed.audio_quality ?? parsed.audioQuality) ?? fallback.audioQuality
  }
  if (enabledModes.includes('video')) {
    analysis.videoPresence = optionalText.parse(parsed.video_presence ?? parsed.videoPresence) ?? fallback.videoPresence
  }
  if (enabledModes.includes('whiteboard')) {
    analysis.whiteboardUsage =
      optionalText.parse(parsed.whiteboard_usage ?? parsed.whiteboardUsage) ?? fallback.whiteboardUsage
  }
  if (enabledModes.includes('screen_share')) {
    analysis.screenShareUsage =
      optionalText.parse(parsed.screen_share_usage ?? parsed.screenShareUsage) ?? fallback.screenShareUsage
  }
  return analysis
}

/** 白板分析：四个列表各自回退为 []；输出中没有 JSON 时返回 null */
export function parseWhiteboardAnalysis(text: string): Omit<WhiteboardAnalysis, 'sequence' | 'filePath'> | null {
  const parsed = extractJSONObject(text)
  if (!parsed) return null
  const list = textList.catch([])
  return {
    componentsIdentified: list.parse(parsed.components_identified ?? parsed.componentsIdentified),
    relationships: list.parse(parsed.relationships),
    missingElements: list.parse(parsed.missing_elements ?? parsed.missingElements),
    designPatterns: list.parse(parsed.design_patterns ?? parsed.designPatterns),
  }
}

/** 分数最低的 n 项能力（同分按名称排序） */
export function lowestCompetencies(scores: Record<string, CompetencyScore>, count: number = 3): string[] {
  return Object.entries(scores)
    .sort(([nameA, a], [nameB, b]) => a.score - b.score || nameA.localeCompare(nameB))
    .slice(0, count)
    .map(([name]) => name)
}

export function parseImprovementPlan(text: string, scores: Record<string, CompetencyScore>): ImprovementPlan {
  const parsed: Record<string, unknown> = extractJSONObject(text) ?? {}

  const priorityAreas = textList.catch([]).parse(parsed.priority_areas ?? parsed.priorityAreas)
  const steps = parseActionItems(parsed.concrete_steps ?? parsed.concreteSteps)
  const resources = textList.catch([]).parse(parsed.resources)

  return {
    priorityAreas: priorityAreas.length > 0 ? priorityAreas : lowestCompetencies(scores),
    concreteSteps: steps.length > 0 ? steps : DEFAULT_ACTION_ITEMS.map((item) => ({ ...item, resources: [...item.resources] })),
    resources: resources.length > 0 ? resources : [...DEFAULT_PLAN_RESOURCES],
  }
}

/**
 * 综合分：能力分加权求和，权重之和为 1；缺失的能力项按回退分计算
 */
export function computeOverallScore(
  scores: Record<string, CompetencyScore>,
  weights: Readonly<Record<string, number>>
): number {
  let total = 0
  for (const [name, weight] of Object.entries(weights)) {
    total += weight * (scores[name]?.score ?? FALLBACK_SCORE)
  }
  return clampScore(total)
}

function parseFeedbackList(value: unknown): FeedbackItem[] {
  if (!Array.isArray(value)) return []
  const items: FeedbackItem[] = []
  for (const raw of value) {
    const result = feedbackItemSchema.safeParse(raw)
    if (result.success) items.push(result.data)
  }
  return items
}

function parseActionItems(value: unknown): ActionItem[] {
  if (!Array.isArray(value)) return []
  const items: ActionItem[] = []
  for (const raw of value) {
    const entry = typeof raw === 'string' ? { description: raw } : raw
    if (!isRecord(entry)) continue
    const description = optionalText.parse(entry.description)
    if (!description) continue
    items.push({
      stepNumber: items.length + 1,
      description,
      resources: evidenceField.parse(entry.resources),
    })
  }
  return items
}

function indexByNormalizedKey(record: Record<string, unknown>): Map<string, unknown> {
  const index = new Map<string, unknown>()
  for (const [key, value] of Object.entries(record)) {
    index.set(normalizeKey(key), value)
  }
  return index
}

/**
 * "Trade-off Analysis" / "trade_off_analysis" / "tradeOffAnalysis" 归一为同一个键；
 * "&" 按 "and" 处理
 */
export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/&/g, 'and').replace(/[^a-z0-9]/g, '')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
