import type { ResumeData } from '@shared/types/session'
import type { SamplingSettings } from '@shared/types/config'
import type { DataStore } from '../db/DataStore'
import type { LLMClientFactory } from './AIInterviewer'
import type { ResumeParser } from './ResumeParser'
import { extractJSONObject } from './evaluationParsers'
import { validateResume } from './validation'
import type { ValidResume } from './validation'
import { aiProviderError, configurationError, isPlatformError, toMessage } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('ResumeManager')

const RESUME_SAMPLING: SamplingSettings = {
  temperature: 0,
  maxOutputTokens: 1000,
}

const EXTRACTION_PROMPT = `Extract the candidate profile from the resume below.
Respond with a single JSON object and nothing else:
{
  "name": "full name or null",
  "email": "email address or null",
  "years_of_experience": <integer years of professional experience>,
  "domain_expertise": ["technical domains such as distributed systems, payments, ml infrastructure"],
  "skills": ["languages, frameworks, tools"],
  "recent_role": "most recent job title or null"
}`

export interface ResumeModelSelection {
  provider: string
  model: string
}

/** 简历导入：文件 → 文本 → 模型抽取结构化字段 → 校验并保存 */
export class ResumeManager {
  constructor(
    private dataStore: DataStore,
    private parser: ResumeParser,
    private clientFor: LLMClientFactory
  ) {}

  async parseResume(filePath: string, userId: string, selection: ResumeModelSelection): Promise<ValidResume> {
    const parsed = await this.parser.parse(filePath)
    log.info('解析简历', { userId, fileName: parsed.fileName, chars: parsed.text.length })

    let output: string
    try {
      const result = await this.clientFor(selection.provider).generate({
        messages: [
          { role: 'system', content: EXTRACTION_PROMPT },
          { role: 'user', content: parsed.text },
        ],
        model: selection.model,
        temperature: RESUME_SAMPLING.temperature,
        maxOutputTokens: RESUME_SAMPLING.maxOutputTokens,
      })
      output = result.text
      log.debug('简历抽取完成', { userId, inputTokens: result.inputTokens, outputTokens: result.outputTokens })
    } catch (err) {
      if (isPlatformError(err)) throw err
      throw aiProviderError(`resume extraction failed: ${toMessage(err)}`, 'transport', { cause: err })
    }

    const fields = extractJSONObject(output)
    if (!fields) {
      throw aiProviderError('resume extraction returned no JSON object', 'malformed-output')
    }

    const resume = validateResume({
      userId,
      name: optionalString(fields.name),
      email: optionalString(fields.email),
      yearsOfExperience: fields.years_of_experience ?? fields.yearsOfExperience,
      domainExpertise: fields.domain_expertise ?? fields.domainExpertise,
      skills: fields.skills ?? undefined,
      recentRole: optionalString(fields.recent_role ?? fields.recentRole),
      rawText: parsed.text,
    })

    await this.dataStore.saveResume(resume)
    log.info('简历已保存', { userId, experienceLevel: resume.experienceLevel })
    return resume
  }

  async getResume(userId: string): Promise<ResumeData | null> {
    if (!userId.trim()) {
      throw configurationError('user id is required', { code: 'invalid-resume' })
    }
    return this.dataStore.getResume(userId)
  }
}

/** 模型常用 null 或空串表示缺失 */
function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined
}
