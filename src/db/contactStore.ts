import { Client } from 'pg';
import { z } from 'zod';
import { DatabaseConfig, maskSecret } from '../config/config';
import { StorageError } from '../lib/errors';
import logger from '../lib/logger';
import { Contact, ContactSummary, RawContactInput, SearchCriteria } from '../model/contact';
import { validateContact } from '../validation/contactValidator';
import {
  SQL,
  SqlStatement,
  buildDelete,
  buildInsert,
  buildSearchQuery,
  buildUpdate,
} from './queryBuilder';

/**
 * The slice of pg's Client the store relies on. One client is created,
 * connected and ended per operation.
 */
export interface DbClient {
  connect(): Promise<unknown>;
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export type ClientFactory = () => DbClient;

// pg folds unquoted identifiers to lower case.
const summaryRowSchema = z.object({
  contact_id: z.number().int(),
  name: z.string(),
  lastname: z.string(),
});

const contactRowSchema = summaryRowSchema.extend({
  phone: z.string().nullable(),
  direction: z.string().nullable(),
  email: z.string().nullable(),
  web: z.string().nullable(),
});

const insertedRowSchema = z.object({ contact_id: z.number().int() });

const versionRowSchema = z.object({ version: z.string() });

function isContactId(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

export class ContactStore {
  private readonly config: Readonly<DatabaseConfig>;
  private readonly createClient: ClientFactory;

  constructor(config: DatabaseConfig, createClient?: ClientFactory) {
    this.config = Object.freeze({ ...config });
    this.createClient = createClient ?? (() => new Client({ ...this.config }));
  }

  toString(): string {
    const { host, port, database, user, password } = this.config;
    return `<ContactStore: host=${host}, port=${port}, dbname=${database}, user=${maskSecret(user)}, password=${maskSecret(password)}>`;
  }

  async checkDatabase(): Promise<string | null> {
    logger.info('[ContactStore] Attempting connection with PostgreSQL database...');
    const version = await this.withClient<string | null>('check', null, async (client) => {
      const { rows } = await client.query(SQL.check);
      return versionRowSchema.parse(rows[0]).version;
    });
    if (version !== null) {
      logger.info('[ContactStore] Connection to database successful', { version });
    }
    return version;
  }

  async ensureSchema(): Promise<boolean> {
    return this.withClient<boolean>('ensureSchema', false, async (client) => {
      await this.inTransaction(client, () => client.query(SQL.createTable));
      return true;
    });
  }

  async insert(input: RawContactInput): Promise<number | null> {
    const validation = validateContact(input);
    if (!validation.valid) {
      logger.error('[ContactStore] Contact rejected, required fields are invalid', {
        fields: validation.errors.map((error) => error.field),
      });
      return null;
    }
    const contact = validation.contact;

    const contactId = await this.withClient<number | null>('insert', null, async (client) => {
      const { rows } = await this.inTransaction(client, () => this.execute(client, buildInsert(contact)));
      return insertedRowSchema.parse(rows[0]).contact_id;
    });
    if (contactId !== null) {
      logger.info('[ContactStore] Contact inserted', { contactId });
    }
    return contactId;
  }

  async update(input: RawContactInput, contactId: number): Promise<number> {
    if (!isContactId(contactId)) {
      logger.warn('[ContactStore] Update skipped, invalid contact id', { contactId });
      return 0;
    }
    const validation = validateContact(input);
    if (!validation.valid) {
      logger.error('[ContactStore] Update rejected, required fields are invalid', {
        contactId,
        fields: validation.errors.map((error) => error.field),
      });
      return 0;
    }
    const contact = validation.contact;

    const updated = await this.withClient<number>('update', 0, async (client) => {
      const { rowCount } = await this.inTransaction(client, () =>
        this.execute(client, buildUpdate(contact, contactId))
      );
      return rowCount ?? 0;
    });
    if (updated > 0) {
      logger.info('[ContactStore] Contact successfully updated', { contactId });
    }
    return updated;
  }

  async delete(contactId: number): Promise<number> {
    if (!isContactId(contactId)) {
      logger.warn('[ContactStore] Delete skipped, invalid contact id', { contactId });
      return 0;
    }

    const deleted = await this.withClient<number>('delete', 0, async (client) => {
      const { rowCount } = await this.inTransaction(client, () => this.execute(client, buildDelete(contactId)));
      return rowCount ?? 0;
    });
    if (deleted > 0) {
      logger.info('[ContactStore] Contact successfully deleted', { contactId });
    }
    return deleted;
  }

  async list(): Promise<ContactSummary[]> {
    return this.withClient<ContactSummary[]>('list', [], async (client) => {
      const { rows } = await client.query(SQL.selectAll);
      return rows.map((row) => {
        const parsed = summaryRowSchema.parse(row);
        return { contactId: parsed.contact_id, name: parsed.name, lastname: parsed.lastname };
      });
    });
  }

  async search(criteria: SearchCriteria): Promise<Contact[]> {
    const statement = buildSearchQuery(criteria);
    if (statement === null) {
      logger.debug('[ContactStore] Search skipped, no filter criteria');
      return [];
    }

    return this.withClient<Contact[]>('search', [], async (client) => {
      const { rows } = await this.execute(client, statement);
      return rows.map((row) => {
        const parsed = contactRowSchema.parse(row);
        return {
          contactId: parsed.contact_id,
          name: parsed.name,
          lastname: parsed.lastname,
          phone: parsed.phone,
          direction: parsed.direction,
          email: parsed.email,
          web: parsed.web,
        };
      });
    });
  }

  private execute(client: DbClient, statement: SqlStatement) {
    return client.query(statement.text, statement.values);
  }

  private async inTransaction<T>(client: DbClient, work: () => Promise<T>): Promise<T> {
    await client.query('BEGIN');
    try {
      const result = await work();
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('[ContactStore] Rollback failed', { error: rollbackError });
      }
      throw error;
    }
  }

  /**
   * Runs `work` on a freshly connected client and always ends it. Any
   * failure is logged as a StorageError and `fallback` is returned.
   */
  private async withClient<T>(operation: string, fallback: T, work: (client: DbClient) => Promise<T>): Promise<T> {
    let client: DbClient | undefined;
    try {
      client = this.createClient();
      await client.connect();
      return await work(client);
    } catch (error) {
      const storageError = new StorageError(operation, error);
      logger.error(`[ContactStore] ${storageError.message}`, { operation });
      return fallback;
    } finally {
      if (client) {
        try {
          await client.end();
        } catch (error) {
          logger.warn('[ContactStore] Failed to close database connection', { operation, error });
        }
      }
    }
  }
}
