import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Knex } from 'knex';
import { buildProgram } from '../../src/cli/program.js';
import { CredentialService } from '../../src/services/credentialService.js';
import { CredentialRepository } from '../../src/repositories/credentialRepository.js';
import { GrantRepository } from '../../src/repositories/grantRepository.js';
import { createKnex } from '../../src/db/client.js';

describe('cli', () => {
  let db: Knex;
  let service: CredentialService;
  let lines: string[];

  const run = async (...args: string[]) => {
    const program = buildProgram({ db, credentials: service, out: (line) => lines.push(line) });
    program.exitOverride();
    await program.parseAsync(['node', 'resource-gateway', ...args]);
  };

  const lastJson = (): unknown => JSON.parse(lines[lines.length - 1] ?? 'null');

  beforeEach(async () => {
    db = createKnex(':memory:');
    service = new CredentialService(new CredentialRepository(db), new GrantRepository(db), {
      prefix: 'rgw',
      defaultLifetimeDays: 90,
    });
    lines = [];
    await run('init');
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('init creates the core tables', async () => {
    expect(lines).toEqual(['Initialized (core tables present).']);
    expect(await db.schema.hasTable('credentials')).toBe(true);
    expect(await db.schema.hasTable('audit_log')).toBe(true);
  });

  it('creates a never-expiring credential and prints its secret', async () => {
    await run('credential', 'create', '--name', 'ci', '--owner', 'owner-1', '--never-expires');
    const issued = lastJson();
    expect(issued).toMatchObject({
      credential: { name: 'ci', ownerId: 'owner-1', expiresAt: null, active: true },
      plaintext: expect.stringMatching(/^rgw_[0-9a-f]{16}_/),
    });
  });

  it('rejects conflicting expiry options', async () => {
    await expect(
      run('credential', 'create', '--name', 'ci', '--owner', 'o', '--never-expires', '--expires-in-days', '5'),
    ).rejects.toThrow('--never-expires and --expires-in-days are mutually exclusive');
  });

  it('grants permissions and groups that authentication then loads', async () => {
    const issued = await service.generate({ name: 'ci', ownerId: 'owner-1' });
    const id = issued.credential.id;
    await run('credential', 'grant', id, 'author:view', 'article:add');
    expect(lastJson()).toEqual({
      id,
      granted: [
        { resource: 'author', action: 'view' },
        { resource: 'article', action: 'add' },
      ],
    });
    await run('group', 'create', 'editors', '--permission', 'article:change', '--permission', 'article:delete');
    await run('credential', 'join', id, 'editors');
    const principal = await service.authenticate(issued.plaintext);
    expect(principal?.permissions).toEqual([
      { resource: 'article', action: 'add' },
      { resource: 'author', action: 'view' },
    ]);
    expect(principal?.groups).toEqual([
      {
        name: 'editors',
        permissions: [
          { resource: 'article', action: 'change' },
          { resource: 'article', action: 'delete' },
        ],
      },
    ]);
  });

  it('rejects malformed permissions', async () => {
    const issued = await service.generate({ name: 'ci', ownerId: 'owner-1' });
    await expect(run('credential', 'grant', issued.credential.id, 'author')).rejects.toThrow(
      'Invalid permission "author", expected <resource>:<action>',
    );
  });

  it('deactivates and lists credentials without secrets', async () => {
    const issued = await service.generate({ name: 'ci', ownerId: 'owner-1' });
    await run('credential', 'deactivate', issued.credential.id);
    expect(lastJson()).toMatchObject({ id: issued.credential.id, active: false });
    await run('credential', 'list');
    const listed = lastJson();
    expect(Array.isArray(listed) ? listed.length : 0).toBe(1);
    expect(lines[lines.length - 1]).not.toContain(issued.plaintext);
  });

  it('regenerates a secret', async () => {
    const issued = await service.generate({ name: 'ci', ownerId: 'owner-1' });
    await run('credential', 'regenerate', issued.credential.id);
    const fresh = lastJson();
    expect(fresh).toMatchObject({ credential: { id: issued.credential.id } });
    expect(await service.authenticate(issued.plaintext)).toBeNull();
  });

  it('prints command names for an empty registry', async () => {
    await run('commands', '--names-only');
    expect(lines[lines.length - 1]).toBe('find_resources');
  });
});
