import fs from 'fs';
import { parse } from 'ini';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';

export const DEFAULT_CONFIG_FILE = 'contact_manager.ini';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface PlacesConfig {
  apiKey: string;
}

export interface AppConfig {
  database: Readonly<DatabaseConfig>;
  places: Readonly<PlacesConfig>;
}

const postgresSectionSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive().max(65535).default(5432),
  dbname: z.string().min(1),
  user: z.string().min(1),
  password: z.string(),
});

const placesSectionSchema = z.object({
  api_key: z.string().min(1),
});

const SECRET_KEYS: ReadonlySet<string> = new Set(['password', 'api_key']);

// ini starts an inline comment at any unescaped ; or # outside quotes.
const INLINE_COMMENT = /(?<!\\)[;#]/;

/**
 * Rejects entries `ini` would read differently than written: `key: value`
 * lines, and unquoted secrets that an inline comment would cut short.
 */
function checkEntries(text: string, filename: string): void {
  for (const line of text.split(/\r?\n/)) {
    const colonEntry = /^\s*([A-Za-z_][\w.-]*)\s*:/.exec(line);
    if (colonEntry) {
      throw new ConfigurationError(`Entry "${colonEntry[1]}" in ${filename} must be written as key = value`);
    }

    const entry = /^\s*([^=\s;#]+)\s*=\s*(.*)$/.exec(line);
    if (!entry) {
      continue;
    }
    const [, key, value] = entry;
    if (SECRET_KEYS.has(key) && !/^["']/.test(value) && INLINE_COMMENT.test(value)) {
      throw new ConfigurationError(`Value of ${key} in ${filename} contains ';' or '#' and must be quoted`);
    }
  }
}

function readSection(parsed: Record<string, unknown>, section: string, filename: string): unknown {
  const value = parsed[section];
  if (value === undefined || value === null || typeof value !== 'object') {
    throw new ConfigurationError(`Section ${section} not found in ${filename} filename`);
  }
  return value;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Parses the INI text of a contact manager configuration.
 * Both the [postgresql] and [googleplaces] sections are mandatory.
 * Values containing ; or # must be quoted.
 */
export function parseConfig(text: string, filename = DEFAULT_CONFIG_FILE): AppConfig {
  checkEntries(text, filename);
  const parsed: Record<string, unknown> = parse(text);

  const postgres = postgresSectionSchema.safeParse(readSection(parsed, 'postgresql', filename));
  if (!postgres.success) {
    throw new ConfigurationError(`Invalid [postgresql] section in ${filename}: ${describeIssues(postgres.error)}`);
  }

  const places = placesSectionSchema.safeParse(readSection(parsed, 'googleplaces', filename));
  if (!places.success) {
    throw new ConfigurationError(`Invalid [googleplaces] section in ${filename}: ${describeIssues(places.error)}`);
  }

  return Object.freeze({
    database: Object.freeze({
      host: postgres.data.host,
      port: postgres.data.port,
      database: postgres.data.dbname,
      user: postgres.data.user,
      password: postgres.data.password,
    }),
    places: Object.freeze({ apiKey: places.data.api_key }),
  });
}

export function loadConfig(filename = DEFAULT_CONFIG_FILE): AppConfig {
  let text: string;
  try {
    text = fs.readFileSync(filename, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration file ${filename}`, error);
  }
  return parseConfig(text, filename);
}

export function maskSecret(secret: string): string {
  return 'X'.repeat(secret.length);
}
