export type ConfidenceLevel = 'low' | 'medium' | 'high'

export interface CompetencyScore {
  score: number
  confidenceLevel: ConfidenceLevel
  /** 对话原文摘录 */
  evidence: string[]
}

export interface FeedbackItem {
  description: string
  evidence: string[]
}

export interface FeedbackSet {
  wentWell: FeedbackItem[]
  wentOkay: FeedbackItem[]
  needsImprovement: FeedbackItem[]
}

/** 各沟通模式评估，仅包含启用的模式 */
export interface CommunicationModeAnalysis {
  audioQuality?: string
  videoPresence?: string
  whiteboardUsage?: string
  screenShareUsage?: string
  overallCommunication: string
}

export interface ActionItem {
  stepNumber: number
  description: string
  resources: string[]
}

export interface ImprovementPlan {
  priorityAreas: string[]
  concreteSteps: ActionItem[]
  resources: string[]
}

/** 评估报告，每个会话只生成一次 */
export interface EvaluationReport extends FeedbackSet {
  id: string
  sessionId: string
  overallScore: number
  competencyScores: Record<string, CompetencyScore>
  communicationModeAnalysis: CommunicationModeAnalysis
  improvementPlan: ImprovementPlan
  createdAt: number
}
