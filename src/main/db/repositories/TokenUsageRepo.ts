import type Database from 'better-sqlite3'

/** 成本以微美元整数存储，聚合结果精确 */
export interface TokenUsageRow {
  id: string
  session_id: string
  operation: string
  provider: string
  model: string
  input_tokens: number
  output_tokens: number
  cost_micros: number
  created_at: number
}

export interface UsageAggregateRow {
  operation: string
  input_tokens: number
  output_tokens: number
  cost_micros: number
  calls: number
}

export class TokenUsageRepo {
  constructor(private db: Database.Database) {}

  create(row: TokenUsageRow): void {
    this.db
      .prepare(
        `INSERT INTO token_usage (id, session_id, operation, provider, model, input_tokens, output_tokens,
           cost_micros, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO NOTHING`
      )
      .run(
        row.id,
        row.session_id,
        row.operation,
        row.provider,
        row.model,
        row.input_tokens,
        row.output_tokens,
        row.cost_micros,
        row.created_at
      )
  }

  listBySession(sessionId: string): TokenUsageRow[] {
    return this.db
      .prepare<[string], TokenUsageRow>(
        'SELECT * FROM token_usage WHERE session_id = ? ORDER BY created_at ASC, rowid ASC'
      )
      .all(sessionId)
  }

  aggregateByOperation(sessionId: string): UsageAggregateRow[] {
    return this.db
      .prepare<[string], UsageAggregateRow>(
        `SELECT operation,
                SUM(input_tokens) as input_tokens,
                SUM(output_tokens) as output_tokens,
                SUM(cost_micros) as cost_micros,
                COUNT(*) as calls
         FROM token_usage
         WHERE session_id = ?
         GROUP BY operation
         ORDER BY operation ASC`
      )
      .all(sessionId)
  }
}
