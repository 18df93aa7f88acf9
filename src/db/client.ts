import fs from 'fs';
import path from 'path';
import { knex, type Knex } from 'knex';
import type Database from 'better-sqlite3';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';

let instance: Knex | undefined;

export function createKnex(filename: string): Knex {
  if (filename !== ':memory:') {
    const dir = path.dirname(path.resolve(process.cwd(), filename));
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  return knex({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
    // Single connection: each in-memory database lives on exactly one.
    pool: {
      min: 1,
      max: 1,
      afterCreate: (conn: Database.Database, done: (err: Error | null, conn: Database.Database) => void) => {
        conn.pragma('foreign_keys = ON');
        done(null, conn);
      },
    },
  });
}

export function getKnex(): Knex {
  if (!instance) {
    const cfg = loadConfig();
    instance = createKnex(cfg.database.filename);
    getLogger().debug({ filename: cfg.database.filename }, 'Database client created');
  }
  return instance;
}

export async function closeKnex(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = undefined;
  }
}
