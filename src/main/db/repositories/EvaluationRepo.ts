import type Database from 'better-sqlite3'
import type { EvaluationReport } from '@shared/types/evaluation'

export class EvaluationRepo {
  constructor(private db: Database.Database) {}

  /** session_id 唯一，重复写入返回 false */
  create(report: EvaluationReport): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO evaluations (id, session_id, overall_score, competency_scores, went_well, went_okay,
           needs_improvement, communication_analysis, improvement_plan, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(session_id) DO NOTHING`
      )
      .run(
        report.id,
        report.sessionId,
        report.overallScore,
        JSON.stringify(report.competencyScores),
        JSON.stringify(report.wentWell),
        JSON.stringify(report.wentOkay),
        JSON.stringify(report.needsImprovement),
        JSON.stringify(report.communicationModeAnalysis),
        JSON.stringify(report.improvementPlan),
        report.createdAt
      )
    return result.changes > 0
  }

  getBySessionId(sessionId: string): EvaluationReport | null {
    const row = this.db
      .prepare<[string], EvaluationRow>('SELECT * FROM evaluations WHERE session_id = ?')
      .get(sessionId)

    return row ? this.toReport(row) : null
  }

  private toReport(row: EvaluationRow): EvaluationReport {
    return {
      id: row.id,
      sessionId: row.session_id,
      overallScore: row.overall_score,
      competencyScores: JSON.parse(row.competency_scores),
      wentWell: JSON.parse(row.went_well),
      wentOkay: JSON.parse(row.went_okay),
      needsImprovement: JSON.parse(row.needs_improvement),
      communicationModeAnalysis: JSON.parse(row.communication_analysis),
      improvementPlan: JSON.parse(row.improvement_plan),
      createdAt: row.created_at,
    }
  }
}

interface EvaluationRow {
  id: string
  session_id: string
  overall_score: number
  competency_scores: string
  went_well: string
  went_okay: string
  needs_improvement: string
  communication_analysis: string
  improvement_plan: string
  created_at: number
}
