import type { ChatMessage } from '@shared/types/llm'
import type { ExperienceLevel, Message, PerformanceIndicators, ResumeData } from '@shared/types/session'
import { deriveExperienceLevel } from './validation'

export const INTERVIEWER_SYSTEM_PROMPT = `You are an expert technical interviewer running a system design interview.

Your job:
1. Ask focused questions about architecture and design choices
2. Probe the candidate's grasp of scalability, reliability and trade-offs
3. Follow up on what the candidate actually said
4. Match the difficulty to the candidate's experience
5. Keep scenarios realistic and practical

Guidelines:
- Be professional and encouraging
- Ask one question at a time
- Cover scalability, reliability, data consistency, trade-offs and monitoring
- Ask clarifying questions when an answer is ambiguous
- Dig into the implications of each design decision

You are assessing the thought process, not only the final design.`

export const DEFAULT_PROBLEM = `Design a URL shortening service like bit.ly.

The service should:
- Accept long URLs and return short URLs
- Redirect users from short URLs to the original long URLs
- Handle high traffic (millions of requests per day)
- Track click analytics for each short URL

Consider scalability, reliability and performance in your design.`

const LEVEL_GUIDANCE: Record<ExperienceLevel, string> = {
  junior: 'basic system components and simple scaling (0-2 years)',
  mid: 'distributed systems concepts and explicit trade-offs (3-5 years)',
  senior: 'multiple services with data consistency concerns (6-10 years)',
  staff: 'large-scale systems with organizational and technical challenges (10+ years)',
}

/** 开场请求：有简历时按经验与领域定制题目，否则使用通用题目 */
export function buildOpeningMessages(resume?: ResumeData): ChatMessage[] {
  if (!resume) {
    return [
      { role: 'system', content: INTERVIEWER_SYSTEM_PROMPT },
      {
        role: 'user',
        content: `Open the interview. Greet the candidate briefly, present the following problem, and invite them to start by clarifying requirements.

Problem:
${DEFAULT_PROBLEM}`,
      },
    ]
  }

  const level = resume.experienceLevel ?? deriveExperienceLevel(resume.yearsOfExperience)
  const background = [
    `Experience level: ${level}`,
    `Years of experience: ${resume.yearsOfExperience}`,
    `Domain expertise: ${resume.domainExpertise.join(', ')}`,
    `Recent role: ${resume.recentRole ?? 'N/A'}`,
  ]
  if (resume.skills?.length) {
    background.push(`Skills: ${resume.skills.join(', ')}`)
  }

  return [
    { role: 'system', content: INTERVIEWER_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Open the interview for a candidate with this background:

${background.join('\n')}

Write one system design problem for them and present it. The problem should:
1. Focus on ${LEVEL_GUIDANCE[level]}
2. Relate to ${resume.domainExpertise[0] ?? 'their domain'} where possible
3. Fit a 45-minute interview
4. Cover scalability, reliability, data modeling and trade-offs
5. State concrete requirements and constraints

Greet the candidate briefly, present the problem, and invite them to start by clarifying requirements.`,
    },
  ]
}

export const CLARIFYING_INSTRUCTION = `Ask one clarifying question about the candidate's last answer.
Point at the part that is ambiguous or underspecified and ask them to make it concrete.
Stay on the current topic.`

export const WHITEBOARD_ANALYSIS_PROMPT = `You review whiteboard snapshots from a system design interview.
Describe only what is drawn. Return a JSON object with these keys, each a list of short strings:
- components_identified: services, stores, queues and clients on the board
- relationships: connections between components, written as "A -> B: purpose"
- missing_elements: components a production design of this kind would still need
- design_patterns: recognizable patterns such as caching, sharding or CQRS`

const DIFFICULTY_GUIDANCE: {
  [K in keyof Required<PerformanceIndicators>]: Record<Required<PerformanceIndicators>[K], string>
} = {
  responseQuality: {
    high: 'Answers have been strong. Raise the difficulty with harder follow-ups and edge cases.',
    medium: 'Answers have been adequate. Keep the current difficulty and ask for more detail.',
    low: 'Answers have been weak. Simplify the next question and offer a hint.',
  },
  depthOfUnderstanding: {
    deep: 'Understanding is deep. Move to advanced trade-offs and failure scenarios.',
    moderate: 'Understanding is moderate. Ask the candidate to justify one decision in depth.',
    shallow: 'Understanding is shallow. Return to fundamentals before going further.',
  },
  technicalAccuracy: {
    accurate: 'Statements have been accurate.',
    mostly_accurate: 'Statements have been mostly accurate. Ask about the details that were off.',
    inaccurate: 'Statements have contained errors. Challenge the incorrect claims directly.',
  },
}

/** 按表现指标生成提问难度说明；没有任何指标时返回 null */
export function buildDifficultyGuidance(indicators: PerformanceIndicators): string | null {
  const lines: string[] = []
  if (indicators.responseQuality) lines.push(DIFFICULTY_GUIDANCE.responseQuality[indicators.responseQuality])
  if (indicators.depthOfUnderstanding) {
    lines.push(DIFFICULTY_GUIDANCE.depthOfUnderstanding[indicators.depthOfUnderstanding])
  }
  if (indicators.technicalAccuracy) lines.push(DIFFICULTY_GUIDANCE.technicalAccuracy[indicators.technicalAccuracy])
  return lines.length > 0 ? `Adjust the next question to the candidate:\n${lines.join('\n')}` : null
}

/** 对话历史转为模型消息：面试官 → assistant，候选人 → user；有表现指标时附加难度说明 */
export function buildConversationMessages(
  history: Message[],
  indicators?: PerformanceIndicators | null
): ChatMessage[] {
  const guidance = indicators ? buildDifficultyGuidance(indicators) : null
  return [
    { role: 'system', content: INTERVIEWER_SYSTEM_PROMPT },
    ...(guidance ? [{ role: 'system' as const, content: guidance }] : []),
    ...history.map((message): ChatMessage => ({
      role: message.role === 'interviewer' ? 'assistant' : 'user',
      content: message.content,
    })),
  ]
}

export function buildClarifyingMessages(history: Message[], indicators?: PerformanceIndicators | null): ChatMessage[] {
  return [...buildConversationMessages(history, indicators), { role: 'system', content: CLARIFYING_INSTRUCTION }]
}

/** 白板快照分析请求，图片以 data URL 传入 */
export function buildWhiteboardMessages(sequence: number, imageUrl: string): ChatMessage[] {
  return [
    { role: 'system', content: WHITEBOARD_ANALYSIS_PROMPT },
    {
      role: 'user',
      content: [
        { type: 'text', text: `Whiteboard snapshot ${sequence}. Analyze the design drawn on it.` },
        { type: 'image_url', image_url: { url: imageUrl } },
      ],
    },
  ]
}
