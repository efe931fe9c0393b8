import { z } from 'zod'
import type { ExperienceLevel, PerformanceIndicators, ResumeData, SessionConfig } from '@shared/types/session'
import {
  COMMUNICATION_MODES,
  EXPERIENCE_LEVEL_THRESHOLDS,
  MAX_YEARS_OF_EXPERIENCE,
} from '@shared/constants'
import { findPricing } from './TokenTracker'
import { configurationError } from '../errors'
import { formatIssues } from '../config/schema'

const nonEmpty = z.string().trim().min(1)

export const resumeSchema = z.object({
  userId: nonEmpty,
  name: nonEmpty.optional(),
  email: z.string().trim().email().optional(),
  experienceLevel: z.enum(['junior', 'mid', 'senior', 'staff']).optional(),
  yearsOfExperience: z.number().int().min(0).max(MAX_YEARS_OF_EXPERIENCE),
  domainExpertise: z.array(nonEmpty).min(1),
  skills: z.array(nonEmpty).optional(),
  recentRole: nonEmpty.optional(),
  rawText: z.string().optional(),
})

export const sessionConfigSchema = z
  .object({
    enabledModes: z
      .array(z.enum(COMMUNICATION_MODES))
      .min(1, 'at least one communication mode must be enabled')
      .refine((modes) => new Set(modes).size === modes.length, 'communication modes must not repeat'),
    aiProvider: nonEmpty,
    aiModel: nonEmpty,
    resumeData: resumeSchema.optional(),
    durationMinutes: z.number().int().min(1).max(180).optional(),
  })
  .superRefine((config, ctx) => {
    if (!findPricing(config.aiProvider, config.aiModel)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['aiModel'],
        message: `unrecognized provider/model pairing ${config.aiProvider}/${config.aiModel}`,
      })
    }
  })

export const performanceIndicatorsSchema = z
  .object({
    responseQuality: z.enum(['high', 'medium', 'low']).optional(),
    depthOfUnderstanding: z.enum(['deep', 'moderate', 'shallow']).optional(),
    technicalAccuracy: z.enum(['accurate', 'mostly_accurate', 'inaccurate']).optional(),
  })
  .strict()

export type ValidResume = ResumeData & { experienceLevel: ExperienceLevel }

/** 按年限推导经验等级：0-2 junior，3-5 mid，6-10 senior，10 年以上 staff */
export function deriveExperienceLevel(years: number): ExperienceLevel {
  for (const { level, minYears } of EXPERIENCE_LEVEL_THRESHOLDS) {
    if (years >= minYears) return level
  }
  return 'junior'
}

/** 校验简历并补全经验等级，失败抛出 configuration 错误 */
export function validateResume(input: unknown): ValidResume {
  const result = resumeSchema.safeParse(input)
  if (!result.success) {
    throw configurationError(`invalid resume data: ${formatIssues(result.error)}`, { code: 'invalid-resume' })
  }
  return normalizeResume(result.data)
}

export function validatePerformanceIndicators(input: unknown): PerformanceIndicators {
  const result = performanceIndicatorsSchema.safeParse(input)
  if (!result.success) {
    throw configurationError(`invalid performance indicators: ${formatIssues(result.error)}`, {
      code: 'invalid-indicators',
    })
  }
  return result.data
}

/** 校验会话配置，失败抛出 configuration 错误 */
export function validateSessionConfig(input: unknown): SessionConfig & { resumeData?: ValidResume } {
  const result = sessionConfigSchema.safeParse(input)
  if (!result.success) {
    throw configurationError(`invalid session config: ${formatIssues(result.error)}`, { code: 'invalid-config' })
  }
  const { resumeData, ...rest } = result.data
  return resumeData ? { ...rest, resumeData: normalizeResume(resumeData) } : rest
}

function normalizeResume(resume: z.infer<typeof resumeSchema>): ValidResume {
  return {
    ...resume,
    experienceLevel: resume.experienceLevel ?? deriveExperienceLevel(resume.yearsOfExperience),
  }
}
