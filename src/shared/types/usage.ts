/** 单次模型调用的用量记录（只追加） */
export interface TokenUsageRecord {
  id: string
  sessionId: string
  operation: string
  provider: string
  model: string
  inputTokens: number
  outputTokens: number
  totalTokens: number
  /** 美元 */
  cost: number
  createdAt: number
}

export interface UsageTotals {
  inputTokens: number
  outputTokens: number
  totalTokens: number
  cost: number
  calls: number
}

export interface OperationUsage extends UsageTotals {
  operation: string
}
