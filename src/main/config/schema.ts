import { z } from 'zod'

const samplingSchema = z.object({
  temperature: z.number().min(0).max(2),
  maxOutputTokens: z.number().int().positive(),
})

export const appConfigSchema = z.object({
  providers: z.record(
    z.object({
      baseURL: z.string().url(),
      timeoutMs: z.number().int().positive(),
    })
  ),
  interviewer: samplingSchema,
  evaluation: samplingSchema,
  storage: z.object({
    dataDir: z.string(),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().nonnegative(),
    backoffFactor: z.number().min(1),
    maxDelayMs: z.number().int().nonnegative(),
  }),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']),
  history: z.object({
    pageSize: z.number().int().min(1).max(500),
    defaultStatus: z.enum(['created', 'active', 'paused', 'completed']).nullable(),
  }),
})

/** zod 校验问题转为单行文本 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}
