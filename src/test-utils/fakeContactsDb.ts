import { ClientFactory, DbClient } from '../db/contactStore';

export interface StoredContactRow {
  contact_id: number;
  name: string;
  lastname: string;
  phone: string | null;
  direction: string | null;
  email: string | null;
  web: string | null;
}

export interface ExecutedStatement {
  text: string;
  values: unknown[];
}

interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

function nullableText(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function requiredText(value: unknown, column: string): string {
  if (typeof value !== 'string') {
    throw new Error(`null value in column "${column}" violates not-null constraint`);
  }
  return value;
}

function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += pattern[i].replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    } else if (char === '%') {
      source += '.*';
    } else if (char === '_') {
      source += '.';
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's');
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * In-memory stand-in for the Contacts table. It understands exactly the
 * statements the store issues and records every one of them.
 */
export class FakeContactsDb {
  readonly rows: StoredContactRow[] = [];
  readonly executed: ExecutedStatement[] = [];
  readonly clients: FakePgClient[] = [];
  tableCreated = false;
  failOn: RegExp | null = null;
  failConnect = false;
  private nextId = 1;

  readonly factory: ClientFactory = () => {
    const client = new FakePgClient(this);
    this.clients.push(client);
    return client;
  };

  statementsMatching(pattern: RegExp): ExecutedStatement[] {
    return this.executed.filter((statement) => pattern.test(statement.text));
  }

  execute(text: string, values: unknown[]): QueryResultLike {
    const sql = text.replace(/\s+/g, ' ').trim();
    this.executed.push({ text: sql, values });

    if (this.failOn && this.failOn.test(sql)) {
      throw new Error(`simulated failure for: ${sql}`);
    }

    if (sql === 'BEGIN' || sql === 'COMMIT' || sql === 'ROLLBACK') {
      return { rows: [], rowCount: null };
    }
    if (sql === 'SELECT version()') {
      return { rows: [{ version: 'PostgreSQL 16.3' }], rowCount: 1 };
    }
    if (sql.startsWith('CREATE TABLE IF NOT EXISTS Contacts')) {
      this.tableCreated = true;
      return { rows: [], rowCount: null };
    }
    if (sql.startsWith('INSERT INTO Contacts')) {
      const row = this.toRow(this.nextId, values);
      this.nextId++;
      this.rows.push(row);
      return { rows: [{ contact_id: row.contact_id }], rowCount: 1 };
    }
    if (sql.startsWith('UPDATE Contacts')) {
      const index = this.rows.findIndex((row) => row.contact_id === values[6]);
      if (index === -1) {
        return { rows: [], rowCount: 0 };
      }
      this.rows[index] = this.toRow(this.rows[index].contact_id, values);
      return { rows: [], rowCount: 1 };
    }
    if (sql.startsWith('DELETE FROM Contacts')) {
      const index = this.rows.findIndex((row) => row.contact_id === values[0]);
      if (index === -1) {
        return { rows: [], rowCount: 0 };
      }
      this.rows.splice(index, 1);
      return { rows: [], rowCount: 1 };
    }
    if (sql === 'SELECT Contact_id, Name, Lastname FROM Contacts') {
      const rows = this.rows.map(({ contact_id, name, lastname }) => ({ contact_id, name, lastname }));
      return { rows, rowCount: rows.length };
    }
    if (sql.startsWith('SELECT Contact_id, Name, Lastname, Phone, Direction, Email, Web FROM Contacts WHERE')) {
      const rows = this.select(sql, values);
      return { rows, rowCount: rows.length };
    }

    throw new Error(`FakeContactsDb does not understand: ${sql}`);
  }

  private toRow(contactId: number, values: unknown[]): StoredContactRow {
    return {
      contact_id: contactId,
      name: requiredText(values[0], 'name'),
      lastname: requiredText(values[1], 'lastname'),
      phone: nullableText(values[2]),
      direction: nullableText(values[3]),
      email: nullableText(values[4]),
      web: nullableText(values[5]),
    };
  }

  private select(sql: string, values: unknown[]): StoredContactRow[] {
    const param = (pattern: RegExp): unknown => {
      const match = pattern.exec(sql);
      return match ? values[Number(match[1]) - 1] : undefined;
    };
    const name = param(/Name = \$(\d+)/);
    const direction = param(/Direction LIKE \$(\d+)/);
    const email = param(/Email = \$(\d+)/);
    const directionPattern = typeof direction === 'string' ? likeToRegExp(direction) : null;

    return this.rows
      .filter((row) => name === undefined || row.name === name)
      .filter((row) => directionPattern === null || (row.direction !== null && directionPattern.test(row.direction)))
      .filter((row) => email === undefined || row.email === email)
      .sort((a, b) => compareText(a.name, b.name) || compareText(a.lastname, b.lastname))
      .map((row) => ({ ...row }));
  }
}

export class FakePgClient implements DbClient {
  connected = false;
  ended = false;

  constructor(private readonly db: FakeContactsDb) {}

  async connect(): Promise<void> {
    if (this.db.failConnect) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    }
    this.connected = true;
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResultLike> {
    if (!this.connected || this.ended) {
      throw new Error('Client is not connected');
    }
    return this.db.execute(text, values);
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}
