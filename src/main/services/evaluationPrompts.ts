import type { ChatMessage } from '@shared/types/llm'
import type { CompetencyScore, FeedbackItem } from '@shared/types/evaluation'
import type { CommunicationMode, Message } from '@shared/types/session'

const EVALUATOR_SYSTEM_PROMPT =
  'You are an expert technical interviewer evaluating system design interview performance. Respond with JSON only.'

/** 对话转为评估用文本 */
export function formatTranscript(messages: readonly Message[]): string {
  if (messages.length === 0) return '(no conversation recorded)'
  return messages
    .map((message) => `${message.role === 'interviewer' ? 'Interviewer' : 'Candidate'}: ${message.content}`)
    .join('\n\n')
}

export function competencyPrompt(transcript: string, competencies: readonly string[]): ChatMessage[] {
  const example = competencies.slice(0, 1).map((name) => `  "${name}": {
    "score": 85,
    "confidence_level": "high",
    "evidence": ["Broke the system into clear components"]
  }`)
  return [
    { role: 'system', content: EVALUATOR_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Evaluate the candidate in the conversation below on each of these competencies:
${competencies.join(', ')}

For each competency give a score from 0 to 100, a confidence_level (high, medium or low) and verbatim evidence quoted from the conversation.

Conversation:
${transcript}

Respond with one JSON object keyed by competency name:
{
${example.join(',\n')},
  ...
}

Base every score on evidence from the conversation.`,
    },
  ]
}

export function feedbackPrompt(transcript: string, scores: Record<string, CompetencyScore>): ChatMessage[] {
  const scoreLines = Object.entries(scores).map(([name, s]) => `- ${name}: ${s.score}/100`)
  return [
    { role: 'system', content: EVALUATOR_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Classify concrete moments from this system design interview into feedback categories.

Competency scores:
${scoreLines.join('\n')}

Conversation:
${transcript}

Respond with JSON:
{
  "went_well": [{"description": "short description", "evidence": ["verbatim excerpt"]}],
  "went_okay": [{"description": "...", "evidence": ["..."]}],
  "needs_improvement": [{"description": "...", "evidence": ["..."]}]
}

Each item must quote the conversation verbatim in evidence.`,
    },
  ]
}

const MODE_FIELDS: Partial<Record<CommunicationMode, string>> = {
  audio: 'audio_quality',
  video: 'video_presence',
  whiteboard: 'whiteboard_usage',
  screen_share: 'screen_share_usage',
}

export function communicationPrompt(
  transcript: string,
  enabledModes: readonly CommunicationMode[],
  mediaSummary: string
): ChatMessage[] {
  const fields = enabledModes
    .map((mode) => MODE_FIELDS[mode])
    .filter((field): field is string => Boolean(field))
  const schema = [...fields, 'overall_communication'].map((field) => `  "${field}": "assessment"`).join(',\n')

  return [
    { role: 'system', content: EVALUATOR_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Assess how the candidate communicated during this interview.

Enabled communication modes: ${enabledModes.join(', ')}
Captured media: ${mediaSummary}

Conversation:
${transcript}

Respond with JSON containing only these fields:
{
${schema}
}`,
    },
  ]
}

export function improvementPlanPrompt(
  scores: Record<string, CompetencyScore>,
  needsImprovement: readonly FeedbackItem[]
): ChatMessage[] {
  const scoreLines = Object.entries(scores).map(([name, s]) => `- ${name}: ${s.score}/100`)
  const areas = needsImprovement.length > 0
    ? needsImprovement.map((item) => `- ${item.description}`).join('\n')
    : '- (none identified)'

  return [
    { role: 'system', content: EVALUATOR_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Create an improvement plan with concrete, actionable steps.

Competency scores:
${scoreLines.join('\n')}

Areas needing improvement:
${areas}

Respond with JSON:
{
  "priority_areas": ["most important area first"],
  "concrete_steps": [{"step_number": 1, "description": "...", "resources": ["..."]}],
  "resources": ["book, course or practice platform"]
}`,
    },
  ]
}
