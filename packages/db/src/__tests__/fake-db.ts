import type { Queryable, QueryOutcome } from '../client'

export interface RecordedQuery {
  text: string
  values: readonly unknown[]
}

/**
 * In-process stand-in for a pg pool. Responses are consumed in order.
 */
export class FakeDb implements Queryable {
  readonly calls: RecordedQuery[] = []
  private readonly responses: Array<QueryOutcome | Error> = []

  respondWith(rows: Record<string, unknown>[], rowCount: number | null = rows.length): this {
    this.responses.push({ rows, rowCount })
    return this
  }

  failWith(error: Error): this {
    this.responses.push(error)
    return this
  }

  async query(text: string, values: readonly unknown[] = []): Promise<QueryOutcome> {
    this.calls.push({ text, values })
    const next = this.responses.shift()
    if (next === undefined) {
      return { rows: [], rowCount: 0 }
    }
    if (next instanceof Error) {
      throw next
    }
    return next
  }
}
