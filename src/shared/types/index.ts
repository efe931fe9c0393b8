export type {
  CommunicationMode,
  SessionStatus,
  ExperienceLevel,
  ResumeData,
  SessionConfig,
  Session,
  MessageRole,
  Message,
  MediaKind,
  MediaFile,
  SessionSummary,
  AuditLevel,
  AuditLogEntry,
  PerformanceIndicators,
  WhiteboardAnalysis,
} from './session'
export type { TokenUsageRecord, UsageTotals, OperationUsage } from './usage'
export type {
  ConfidenceLevel,
  CompetencyScore,
  FeedbackItem,
  FeedbackSet,
  CommunicationModeAnalysis,
  ActionItem,
  ImprovementPlan,
  EvaluationReport,
} from './evaluation'
export type {
  ProviderApiStyle,
  ModelPricing,
  LLMProviderPreset,
  LLMProvider,
  ChatMessage,
  ChatMessageContent,
  GenerateRequest,
  GenerateResult,
  LLMClient,
} from './llm'
export type {
  AppConfig,
  ProviderSettings,
  SamplingSettings,
  RetrySettings,
  StorageConfig,
  LogLevelSetting,
} from './config'
