import type Database from 'better-sqlite3'
import type { ExperienceLevel, ResumeData } from '@shared/types/session'

export class ResumeRepo {
  constructor(private db: Database.Database) {}

  /** 按 userId 插入或覆盖 */
  upsert(resume: ResumeData & { experienceLevel: ExperienceLevel }, now: number = Date.now()): void {
    this.db
      .prepare(
        `INSERT INTO resumes (user_id, name, email, experience_level, years_of_experience, domain_expertise,
           skills, recent_role, raw_text, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           name = excluded.name,
           email = excluded.email,
           experience_level = excluded.experience_level,
           years_of_experience = excluded.years_of_experience,
           domain_expertise = excluded.domain_expertise,
           skills = excluded.skills,
           recent_role = excluded.recent_role,
           raw_text = excluded.raw_text,
           updated_at = excluded.updated_at`
      )
      .run(
        resume.userId,
        resume.name ?? null,
        resume.email ?? null,
        resume.experienceLevel,
        resume.yearsOfExperience,
        JSON.stringify(resume.domainExpertise),
        JSON.stringify(resume.skills ?? []),
        resume.recentRole ?? null,
        resume.rawText ?? null,
        now,
        now
      )
  }

  getByUserId(userId: string): ResumeData | null {
    const row = this.db
      .prepare<[string], ResumeRow>('SELECT * FROM resumes WHERE user_id = ?')
      .get(userId)

    return row ? this.toResume(row) : null
  }

  private toResume(row: ResumeRow): ResumeData {
    return {
      userId: row.user_id,
      ...(row.name !== null ? { name: row.name } : {}),
      ...(row.email !== null ? { email: row.email } : {}),
      experienceLevel: row.experience_level,
      yearsOfExperience: row.years_of_experience,
      domainExpertise: JSON.parse(row.domain_expertise),
      skills: JSON.parse(row.skills),
      ...(row.recent_role !== null ? { recentRole: row.recent_role } : {}),
      ...(row.raw_text !== null ? { rawText: row.raw_text } : {}),
    }
  }
}

interface ResumeRow {
  user_id: string
  name: string | null
  email: string | null
  experience_level: ExperienceLevel
  years_of_experience: number
  domain_expertise: string
  skills: string
  recent_role: string | null
  raw_text: string | null
  created_at: number
  updated_at: number
}
