/**
 * SQLite access for the persistence collaborator
 * Uses better-sqlite3 for synchronous reads of whole tables
 */

import Database from 'better-sqlite3';
import { existsSync } from 'fs';
import { DataLoadError, errorMessage } from '@/core/errors';
import { createDataset } from '@/quality/dataset';
import type { Dataset } from '@/quality/types';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface OpenDatabaseOptions {
  readonly?: boolean;
}

export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Database.Database {
  const readonly = options.readonly ?? true;
  if (dbPath !== ':memory:' && readonly && !existsSync(dbPath)) {
    throw new DataLoadError(`Database not found at ${dbPath}`);
  }

  logger.info({ dbPath, readonly }, 'Opening database');

  try {
    return new Database(dbPath, { readonly, fileMustExist: readonly });
  } catch (error) {
    throw new DataLoadError(`Could not open database at ${dbPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}

export function listTables(db: Database.Database): string[] {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all();
  return rows.flatMap((row) => {
    if (row !== null && typeof row === 'object' && 'name' in row && typeof row.name === 'string') {
      return [row.name];
    }
    return [];
  });
}

function tableColumns(db: Database.Database, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all();
  return rows.flatMap((row) => {
    if (row !== null && typeof row === 'object' && 'name' in row && typeof row.name === 'string') {
      return [row.name];
    }
    return [];
  });
}

/**
 * Materialize a whole table as a Dataset. Unknown tables, invalid
 * identifiers and non-scalar cells (BLOBs) raise DataLoadError.
 */
export function loadTable(db: Database.Database, table: string): Dataset {
  if (!IDENTIFIER_PATTERN.test(table)) {
    throw new DataLoadError(`Invalid table name: ${table}`);
  }
  if (!listTables(db).includes(table)) {
    throw new DataLoadError(`Table ${table} does not exist`);
  }

  const columns = tableColumns(db, table);
  const rows = db.prepare(`SELECT * FROM "${table}"`).all();

  try {
    const dataset = createDataset(rows, columns);
    logger.debug({ table, records: dataset.records.length, columns: columns.length }, 'Table loaded');
    return dataset;
  } catch (error) {
    throw new DataLoadError(`Could not load table ${table}: ${errorMessage(error)}`, { cause: error });
  }
}
