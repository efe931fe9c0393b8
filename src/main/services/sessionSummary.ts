interface SessionHeadlineInput {
  overallScore?: number | null
  priorityAreas?: string[]
  messages?: Array<{
    role?: 'interviewer' | 'candidate' | string
    content?: string | null
  }>
  maxLength?: number
}

export const DEFAULT_HEADLINE = 'No conversation yet'

function compactText(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

function clip(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  if (maxLength <= 3) return '.'.repeat(maxLength)
  return `${text.slice(0, maxLength - 3)}...`
}

/** 历史列表标题：有评估时展示分数与重点，否则取第一条面试官消息 */
export function buildSessionHeadline(input: SessionHeadlineInput): string {
  const maxLength = Number.isFinite(input.maxLength) ? Math.max(8, Number(input.maxLength)) : 120

  if (typeof input.overallScore === 'number') {
    const focus = (input.priorityAreas ?? []).map(compactText).filter(Boolean)
    const merged = focus.length
      ? `Score ${input.overallScore} - focus: ${focus.join(', ')}`
      : `Score ${input.overallScore}`
    return clip(merged, maxLength)
  }

  const messages = input.messages ?? []
  const firstInterviewer = messages.find((message) => {
    return message.role === 'interviewer' && compactText(message.content ?? '').length > 0
  })
  if (firstInterviewer) {
    return clip(compactText(firstInterviewer.content ?? ''), maxLength)
  }

  const firstAny = messages.find((message) => compactText(message.content ?? '').length > 0)
  if (firstAny) {
    return clip(compactText(firstAny.content ?? ''), maxLength)
  }

  return DEFAULT_HEADLINE
}

/** 会话时长（分钟，保留一位小数）；未开始或未结束时为 null */
export function sessionDurationMinutes(startedAt: number | null, endedAt: number | null): number | null {
  if (startedAt === null || endedAt === null || endedAt < startedAt) return null
  return Math.round((endedAt - startedAt) / 6000) / 10
}
