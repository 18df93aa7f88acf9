#!/usr/bin/env node
import { closeKnex, getKnex } from '../db/client.js';
import { CredentialRepository } from '../repositories/credentialRepository.js';
import { GrantRepository } from '../repositories/grantRepository.js';
import { CredentialService } from '../services/credentialService.js';
import { getLogger } from '../utils/logging.js';
import { buildProgram } from './program.js';

const db = getKnex();
const program = buildProgram({
  db,
  credentials: new CredentialService(new CredentialRepository(db), new GrantRepository(db)),
});

program
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    getLogger().error({ err }, 'Command failed');
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(() => closeKnex());
