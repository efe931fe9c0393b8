/** 沟通模式 */
export type CommunicationMode = 'text' | 'audio' | 'video' | 'whiteboard' | 'screen_share'

/** 会话状态：created → active ⇄ paused → completed */
export type SessionStatus = 'created' | 'active' | 'paused' | 'completed'

export type ExperienceLevel = 'junior' | 'mid' | 'senior' | 'staff'

/** 候选人简历（结构化） */
export interface ResumeData {
  userId: string
  name?: string
  email?: string
  experienceLevel?: ExperienceLevel
  yearsOfExperience: number
  domainExpertise: string[]
  skills?: string[]
  recentRole?: string
  rawText?: string
}

/** 会话配置，创建后不可变 */
export interface SessionConfig {
  enabledModes: CommunicationMode[]
  aiProvider: string
  aiModel: string
  resumeData?: ResumeData
  durationMinutes?: number
}

/** 面试会话 */
export interface Session {
  id: string
  userId: string
  config: SessionConfig
  status: SessionStatus
  activeModes: CommunicationMode[]
  createdAt: number
  startedAt: number | null
  endedAt: number | null
}

export type MessageRole = 'interviewer' | 'candidate'

/** 对话消息（只追加） */
export interface Message {
  id: string
  sessionId: string
  role: MessageRole
  content: string
  timestamp: number
}

export type MediaKind = 'whiteboard' | 'screen' | 'audio' | 'video'

/** 媒体文件记录，sequence 按 (session, kind) 从 1 连续递增 */
export interface MediaFile {
  id: string
  sessionId: string
  kind: MediaKind
  /** 相对于存储根目录的路径 */
  filePath: string
  sequence: number
  sizeBytes: number
  createdAt: number
}

/** 历史列表项 */
export interface SessionSummary {
  id: string
  userId: string
  status: SessionStatus
  createdAt: number
  durationMinutes: number | null
  overallScore: number | null
  headline: string
}

export type AuditLevel = 'warn' | 'error'

export interface AuditLogEntry {
  timestamp: number
  level: AuditLevel
  scope: string
  message: string
  sessionId: string | null
}

/** 候选人表现指标，用于调整后续提问的难度 */
export interface PerformanceIndicators {
  responseQuality?: 'high' | 'medium' | 'low'
  depthOfUnderstanding?: 'deep' | 'moderate' | 'shallow'
  technicalAccuracy?: 'accurate' | 'mostly_accurate' | 'inaccurate'
}

/** 白板快照分析 */
export interface WhiteboardAnalysis {
  sequence: number
  filePath: string
  componentsIdentified: string[]
  relationships: string[]
  missingElements: string[]
  designPatterns: string[]
}
