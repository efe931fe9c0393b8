import type { LLMProviderPreset } from './types/llm'
import type { CommunicationMode, ExperienceLevel } from './types/session'

export const COMMUNICATION_MODES = [
  'text',
  'audio',
  'video',
  'whiteboard',
  'screen_share',
] as const satisfies readonly CommunicationMode[]

/** LLM 供应商预设
 *  baseURL 统一包含版本路径，单价为美元 / 百万 token
 */
export const LLM_PROVIDER_PRESETS: LLMProviderPreset[] = [
  {
    id: 'openai',
    name: 'OpenAI',
    baseURL: 'https://api.openai.com/v1',
    apiStyle: 'openai-compatible',
    apiKeyEnv: 'OPENAI_API_KEY',
    defaultModel: 'gpt-4-turbo-preview',
    models: [
      { model: 'gpt-4-turbo-preview', inputPerMillion: 10, outputPerMillion: 30 },
      { model: 'gpt-4', inputPerMillion: 30, outputPerMillion: 60 },
      { model: 'gpt-3.5-turbo', inputPerMillion: 0.5, outputPerMillion: 1.5 },
    ],
  },
  {
    id: 'anthropic',
    name: 'Anthropic',
    baseURL: 'https://api.anthropic.com/v1',
    apiStyle: 'anthropic',
    apiKeyEnv: 'ANTHROPIC_API_KEY',
    defaultModel: 'claude-3-sonnet-20240229',
    models: [
      { model: 'claude-3-opus-20240229', inputPerMillion: 15, outputPerMillion: 75 },
      { model: 'claude-3-sonnet-20240229', inputPerMillion: 3, outputPerMillion: 15 },
      { model: 'claude-3-haiku-20240307', inputPerMillion: 0.25, outputPerMillion: 1.25 },
    ],
  },
]

/** 评估能力项及权重（权重之和为 1） */
export const COMPETENCY_WEIGHTS: Readonly<Record<string, number>> = {
  'Problem Decomposition': 0.2,
  'Scalability Considerations': 0.2,
  'Reliability & Fault Tolerance': 0.15,
  'Data Modeling': 0.15,
  'Trade-off Analysis': 0.1,
  'Communication Clarity': 0.1,
  'System Design Patterns': 0.1,
}

export const COMPETENCIES: readonly string[] = Object.keys(COMPETENCY_WEIGHTS)

/** 经验等级对应的最少年限，按从高到低匹配 */
export const EXPERIENCE_LEVEL_THRESHOLDS: ReadonlyArray<{ level: ExperienceLevel; minYears: number }> = [
  { level: 'staff', minYears: 11 },
  { level: 'senior', minYears: 6 },
  { level: 'mid', minYears: 3 },
  { level: 'junior', minYears: 0 },
]

export const MAX_YEARS_OF_EXPERIENCE = 60
