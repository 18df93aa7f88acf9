import path from 'path';
import { pathToFileURL } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import type { Knex } from 'knex';
import { ensureCoreSchema } from '../db/schema.js';
import { parsePermission } from '../core/permissions.js';
import { listCommands } from '../dispatcher/commandCatalog.js';
import { ResourceRegistry } from '../resources/registry.js';
import { getLogger } from '../utils/logging.js';
import type { CredentialService } from '../services/credentialService.js';

export interface CliDeps {
  db: Knex;
  credentials: CredentialService;
  // Output sink; defaults to stdout.
  out?: (line: string) => void;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function permissionList(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

async function loadRegistry(modulePath: string): Promise<ResourceRegistry> {
  const mod: unknown = await import(pathToFileURL(path.resolve(process.cwd(), modulePath)).href);
  const candidate = typeof mod === 'object' && mod !== null ? Reflect.get(mod, 'registry') : undefined;
  if (!(candidate instanceof ResourceRegistry)) {
    throw new Error(`${modulePath} does not export a "registry" ResourceRegistry`);
  }
  return candidate;
}

/** Credential administration. Secrets are printed once, on create and regenerate. */
export function buildProgram(deps: CliDeps): Command {
  const { db, credentials } = deps;
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const json = (value: unknown) => out(JSON.stringify(value, null, 2));

  const program = new Command();
  program.name('resource-gateway').description('Resource gateway credential administration').version('0.1.0');

  program
    .command('init')
    .description('Create the credential, grant and audit tables if missing')
    .action(async () => {
      await ensureCoreSchema(db);
      getLogger().info('Core schema ensured');
      out('Initialized (core tables present).');
    });

  const credential = program.command('credential').description('Manage bearer credentials');

  credential
    .command('create')
    .description('Issue a credential and print its secret once')
    .requiredOption('--name <name>', 'Display name')
    .requiredOption('--owner <ownerId>', 'Identity audit records are attributed to')
    .option('--expires-in-days <days>', 'Lifetime in days (default from config)', positiveInt)
    .option('--never-expires', 'Issue a credential without expiry', false)
    .action(async (opts: { name: string; owner: string; expiresInDays?: number; neverExpires: boolean }) => {
      if (opts.neverExpires && opts.expiresInDays !== undefined) {
        throw new InvalidArgumentError('--never-expires and --expires-in-days are mutually exclusive');
      }
      let expiresAt: Date | null | undefined;
      if (opts.neverExpires) expiresAt = null;
      else if (opts.expiresInDays !== undefined) {
        expiresAt = new Date(Date.now() + opts.expiresInDays * 24 * 60 * 60 * 1000);
      }
      json(await credentials.generate({ name: opts.name, ownerId: opts.owner, expiresAt }));
    });

  credential
    .command('list')
    .description('List credentials (no secrets)')
    .action(async () => {
      json(await credentials.list());
    });

  credential
    .command('deactivate')
    .argument('<id>', 'Credential id')
    .description('Deactivate a credential; it is kept for audit attribution')
    .action(async (id: string) => {
      json(await credentials.deactivate(id));
    });

  credential
    .command('regenerate')
    .argument('<id>', 'Credential id')
    .description('Replace the secret under the same key and print it once')
    .action(async (id: string) => {
      json(await credentials.regenerate(id));
    });

  credential
    .command('grant')
    .argument('<id>', 'Credential id')
    .argument('<permissions...>', 'Permissions as resource:action')
    .description('Grant permissions directly to a credential')
    .action(async (id: string, permissions: string[]) => {
      const parsed = permissions.map(parsePermission);
      for (const p of parsed) await credentials.grantPermission(id, p);
      json({ id, granted: parsed });
    });

  credential
    .command('join')
    .argument('<id>', 'Credential id')
    .argument('<group>', 'Group name')
    .description('Add a credential to a permission group')
    .action(async (id: string, group: string) => {
      await credentials.addToGroup(id, group);
      json({ id, group });
    });

  program
    .command('group')
    .description('Manage permission groups')
    .command('create')
    .argument('<name>', 'Group name')
    .option('--permission <permission>', 'Permission as resource:action (repeatable)', permissionList)
    .description('Create a group or add permissions to an existing one')
    .action(async (name: string, opts: { permission?: string[] }) => {
      json(await credentials.createGroup(name, (opts.permission ?? []).map(parsePermission)));
    });

  program
    .command('commands')
    .description('Print the command catalog for a resource registry module')
    .option('--module <path>', 'Module exporting `registry`')
    .option('--names-only', 'Print command names only', false)
    .action(async (opts: { module?: string; namesOnly: boolean }) => {
      const registry = opts.module ? await loadRegistry(opts.module) : new ResourceRegistry();
      const catalog = listCommands(registry);
      if (opts.namesOnly) catalog.forEach((c) => out(c.name));
      else json(catalog);
    });

  return program;
}
