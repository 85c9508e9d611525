import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { env } from '../config/env';
import { applyMigrations } from './schema';

export const openDatabase = (filename: string, verbose = false): BetterSqlite3.Database => {
  const inMemory = filename === ':memory:';
  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const database = new Database(filename, {
    verbose: verbose ? console.log : undefined,
  });

  database.pragma('foreign_keys = ON');
  if (!inMemory) {
    database.pragma('journal_mode = WAL');
  }
  applyMigrations(database);
  return database;
};

const db = openDatabase(env.sqlitePath, env.nodeEnv === 'development');

export { db };
