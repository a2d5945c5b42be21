import type { SqlConnection, SqlPool } from '../../src/services/pgStore.js';

export interface RecordedQuery {
  text: string;
  values: unknown[];
  /** `pool` for one-off queries, otherwise the number of the checked-out connection */
  on: 'pool' | number;
}

type Reply = unknown[] | Error;

/**
 * Stand-in for a pg Pool. Records every statement and answers with the rows
 * (or error) registered for the first fragment the SQL text contains.
 */
export class RecordingPool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  readonly releases: Array<Error | boolean | undefined> = [];
  private readonly replies: Array<{ fragment: string; reply: Reply }> = [];
  private connections = 0;

  when(fragment: string, reply: Reply): this {
    this.replies.push({ fragment, reply });
    return this;
  }

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    return this.answer('pool', text, values);
  }

  async connect(): Promise<SqlConnection> {
    this.connections += 1;
    const on = this.connections;
    return {
      query: async (text, values = []) => this.answer(on, text, values),
      release: (err) => {
        this.releases.push(err);
      },
    };
  }

  /** First keyword of each statement, in order */
  statements(): string[] {
    return this.queries.map((query) => query.text.trim().split(/\s/)[0]);
  }

  private answer(on: 'pool' | number, text: string, values: unknown[]): { rows: unknown[] } {
    this.queries.push({ text, values, on });
    const reply = this.replies.find(({ fragment }) => text.includes(fragment))?.reply ?? [];
    if (reply instanceof Error) {
      throw reply;
    }
    return { rows: reply };
  }
}

export function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error(`database error ${code}`), { code, constraint });
}
