import crypto from 'crypto';
import type { Knex } from 'knex';
import { getKnex } from '../db/client.js';
import { CORE_TABLES } from '../db/schema.js';
import { NotFoundError, RepositoryError } from './errors.js';
import type { Credential } from '../core/types.js';

interface CredentialRow {
  id: string;
  name: string;
  token_key: string;
  token_hash: string;
  salt: string;
  owner_id: string;
  is_active: number | boolean;
  created_at: string;
  expires_at: string | null;
  last_used_at: string | null;
}

function map(row: CredentialRow): Credential {
  return {
    id: row.id,
    name: row.name,
    key: row.token_key,
    secretHash: row.token_hash,
    salt: row.salt,
    ownerId: row.owner_id,
    active: Boolean(row.is_active),
    createdAt: new Date(row.created_at),
    expiresAt: row.expires_at ? new Date(row.expires_at) : null,
    lastUsedAt: row.last_used_at ? new Date(row.last_used_at) : null,
  };
}

export interface CreateCredentialInput {
  name: string;
  key: string;
  secretHash: string;
  salt: string;
  ownerId: string;
  expiresAt: Date | null;
}

export class CredentialRepository {
  constructor(private readonly db: Knex = getKnex()) {}

  private get table() {
    return this.db<CredentialRow>(CORE_TABLES.credentials);
  }

  async create(data: CreateCredentialInput): Promise<Credential> {
    const row: CredentialRow = {
      id: crypto.randomUUID(),
      name: data.name,
      token_key: data.key,
      token_hash: data.secretHash,
      salt: data.salt,
      owner_id: data.ownerId,
      is_active: 1,
      created_at: new Date().toISOString(),
      expires_at: data.expiresAt ? data.expiresAt.toISOString() : null,
      last_used_at: null,
    };
    try {
      await this.table.insert(row);
      return map(row);
    } catch (err) {
      throw new RepositoryError('Failed to create credential', err);
    }
  }

  async get(id: string): Promise<Credential> {
    try {
      const row = await this.table.where({ id }).first();
      if (!row) throw new NotFoundError(`Credential ${id} not found`);
      return map(row);
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      throw new RepositoryError(`Failed to get credential ${id}`, err);
    }
  }

  async findByKey(key: string): Promise<Credential | null> {
    try {
      const row = await this.table.where({ token_key: key }).first();
      return row ? map(row) : null;
    } catch (err) {
      throw new RepositoryError('Failed to look up credential by key', err);
    }
  }

  async list(): Promise<Credential[]> {
    try {
      const rows = await this.table.select('*').orderBy('created_at', 'desc');
      return rows.map(map);
    } catch (err) {
      throw new RepositoryError('Failed to list credentials', err);
    }
  }

  async updateSecret(id: string, secretHash: string, salt: string): Promise<Credential> {
    return this.patch(id, { token_hash: secretHash, salt }, 'update credential secret');
  }

  async deactivate(id: string): Promise<Credential> {
    return this.patch(id, { is_active: 0 }, 'deactivate credential');
  }

  async touchLastUsed(id: string, at: Date): Promise<void> {
    try {
      await this.table.where({ id }).update({ last_used_at: at.toISOString() });
    } catch (err) {
      throw new RepositoryError(`Failed to record use of credential ${id}`, err);
    }
  }

  private async patch(id: string, data: Partial<CredentialRow>, what: string): Promise<Credential> {
    try {
      const updated: number = await this.table.where({ id }).update(data);
      if (updated === 0) throw new NotFoundError(`Credential ${id} not found`);
      return await this.get(id);
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      throw new RepositoryError(`Failed to ${what} ${id}`, err);
    }
  }
}
