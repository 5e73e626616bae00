import { ContactInput, SearchCriteria } from '../model/contact';

export interface SqlStatement {
  text: string;
  values: unknown[];
}

export type SqlParams = Record<string, unknown>;

export const SQL = Object.freeze({
  check: 'SELECT version()',
  createTable: `
    CREATE TABLE IF NOT EXISTS Contacts (
      Contact_id SERIAL PRIMARY KEY,
      Name VARCHAR(25) NOT NULL,
      Lastname VARCHAR(25) NOT NULL,
      Phone VARCHAR(25),
      Direction VARCHAR(150),
      Email VARCHAR(50),
      Web VARCHAR(150)
    )
  `,
  insert: `
    INSERT INTO Contacts (Name, Lastname, Phone, Direction, Email, Web)
    VALUES (:name, :lastname, :phone, :direction, :email, :web)
    RETURNING Contact_id
  `,
  update: `
    UPDATE Contacts
    SET Name = :name,
        Lastname = :lastname,
        Phone = :phone,
        Direction = :direction,
        Email = :email,
        Web = :web
    WHERE Contact_id = :contactId
  `,
  delete: 'DELETE FROM Contacts WHERE Contact_id = :contactId',
  selectAll: 'SELECT Contact_id, Name, Lastname FROM Contacts',
  select: 'SELECT Contact_id, Name, Lastname, Phone, Direction, Email, Web FROM Contacts WHERE',
  sort: 'ORDER BY Name ASC, Lastname ASC',
});

const PLACEHOLDER = /(?<!:):([a-zA-Z_][a-zA-Z0-9_]*)/g;

/**
 * Rewrites `:name` placeholders into pg's positional `$n` form. A name used
 * more than once is bound once. Every placeholder must have a value in
 * `params`; `null` is a value, `undefined` is not.
 */
export function compile(template: string, params: SqlParams = {}): SqlStatement {
  const positions = new Map<string, number>();
  const values: unknown[] = [];

  const text = template.replace(PLACEHOLDER, (_match, name: string) => {
    let position = positions.get(name);
    if (position === undefined) {
      if (!(name in params) || params[name] === undefined) {
        throw new Error(`Missing value for SQL parameter :${name}`);
      }
      values.push(params[name]);
      position = values.length;
      positions.set(name, position);
    }
    return `$${position}`;
  });

  return { text, values };
}

// LIKE treats % and _ as wildcards and \ as its escape character.
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function present(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

export function buildConditions(criteria: SearchCriteria): { clauses: string[]; params: SqlParams } {
  const clauses: string[] = [];
  const params: SqlParams = {};

  if (present(criteria.name)) {
    clauses.push('Name = :name');
    params.name = criteria.name.trim();
  }
  if (present(criteria.direction)) {
    clauses.push('Direction LIKE :direction');
    params.direction = `%${escapeLike(criteria.direction.trim())}%`;
  }
  if (present(criteria.email)) {
    clauses.push('Email = :email');
    params.email = criteria.email.trim();
  }

  return { clauses, params };
}

/**
 * Builds the filtered select. Returns null when no criterion is present:
 * an empty filter never turns into a select of the whole table.
 */
export function buildSearchQuery(criteria: SearchCriteria): SqlStatement | null {
  const { clauses, params } = buildConditions(criteria);
  if (clauses.length === 0) {
    return null;
  }
  return compile(`${SQL.select} ${clauses.join(' AND ')} ${SQL.sort}`, params);
}

export function buildInsert(contact: ContactInput): SqlStatement {
  return compile(SQL.insert, { ...contact });
}

export function buildUpdate(contact: ContactInput, contactId: number): SqlStatement {
  return compile(SQL.update, { ...contact, contactId });
}

export function buildDelete(contactId: number): SqlStatement {
  return compile(SQL.delete, { contactId });
}
