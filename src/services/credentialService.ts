import { CredentialRepository } from '../repositories/credentialRepository.js';
import { GrantRepository } from '../repositories/grantRepository.js';
import { BearerTokenGenerator } from '../tokens/bearerToken.js';
import { hashSecret, hashesEqual, randomSalt } from '../utils/hashing.js';
import { getLogger } from '../utils/logging.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import { authFailuresTotal, credentialRegenerationsTotal } from '../metrics/index.js';
import type { Credential, Permission, PermissionGroup, Principal } from '../core/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
// Used for lookups that miss so every verification performs one hash.
const DUMMY_SALT = randomSalt();

export interface GenerateCredentialRequest {
  name: string;
  ownerId: string;
  // Omitted: default lifetime. null: never expires.
  expiresAt?: Date | null;
}

export interface PublicCredential {
  id: string;
  name: string;
  ownerId: string;
  active: boolean;
  createdAt: string;
  expiresAt: string | null;
  lastUsedAt: string | null;
  expired: boolean;
}

export interface IssuedCredential {
  credential: PublicCredential;
  // Shown once; only the hash is stored.
  plaintext: string;
}

export function isExpired(credential: Credential, now = new Date()): boolean {
  return credential.expiresAt !== null && now.getTime() >= credential.expiresAt.getTime();
}

export function isValid(credential: Credential, now = new Date()): boolean {
  return credential.active && !isExpired(credential, now);
}

export function toPublicCredential(c: Credential, now = new Date()): PublicCredential {
  return {
    id: c.id,
    name: c.name,
    ownerId: c.ownerId,
    active: c.active,
    createdAt: c.createdAt.toISOString(),
    expiresAt: c.expiresAt ? c.expiresAt.toISOString() : null,
    lastUsedAt: c.lastUsedAt ? c.lastUsedAt.toISOString() : null,
    expired: isExpired(c, now),
  };
}

export class CredentialService {
  private readonly tokens: BearerTokenGenerator;

  constructor(
    private credentialRepo = new CredentialRepository(),
    private grantRepo = new GrantRepository(),
    private settings: AppConfig['credentials'] = loadConfig().credentials,
  ) {
    this.tokens = new BearerTokenGenerator(settings.prefix);
  }

  async generate(req: GenerateCredentialRequest): Promise<IssuedCredential> {
    const token = this.tokens.generate();
    const salt = randomSalt();
    const expiresAt =
      req.expiresAt === undefined ? new Date(Date.now() + this.settings.defaultLifetimeDays * DAY_MS) : req.expiresAt;
    const credential = await this.credentialRepo.create({
      name: req.name,
      ownerId: req.ownerId,
      key: token.key,
      salt,
      secretHash: hashSecret(token.secret, salt),
      expiresAt,
    });
    getLogger().info({ credentialId: credential.id, ownerId: credential.ownerId }, 'Credential created');
    return { credential: toPublicCredential(credential), plaintext: token.plaintext };
  }

  /** Returns the credential only when the secret matches and the credential is valid. */
  async verify(presented: string): Promise<Credential | null> {
    const parsed = this.tokens.parse(presented);
    if (!parsed) {
      hashSecret(presented, DUMMY_SALT);
      return null;
    }
    const credential = await this.credentialRepo.findByKey(parsed.key);
    const computed = hashSecret(parsed.secret, credential ? credential.salt : DUMMY_SALT);
    if (!credential || !hashesEqual(computed, credential.secretHash)) return null;
    return isValid(credential) ? credential : null;
  }

  async markUsed(credential: Credential): Promise<void> {
    try {
      await this.credentialRepo.touchLastUsed(credential.id, new Date());
    } catch (err) {
      getLogger().warn({ err, credentialId: credential.id }, 'Failed to record credential use');
    }
  }

  async loadPrincipal(credential: Credential): Promise<Principal> {
    const [permissions, groups] = await Promise.all([
      this.grantRepo.listForCredential(credential.id),
      this.grantRepo.listGroupsForCredential(credential.id),
    ]);
    return { id: credential.id, name: credential.name, auditId: credential.ownerId, permissions, groups };
  }

  /** Verify, record use and load grants. Any failure yields null. */
  async authenticate(presented: string): Promise<Principal | null> {
    const log = getLogger();
    try {
      const credential = await this.verify(presented);
      if (!credential) {
        authFailuresTotal.inc();
        log.debug('Bearer credential rejected');
        return null;
      }
      await this.markUsed(credential);
      return await this.loadPrincipal(credential);
    } catch (err) {
      authFailuresTotal.inc();
      log.error({ err }, 'Authentication failed with an unexpected error');
      return null;
    }
  }

  async regenerate(id: string): Promise<IssuedCredential> {
    const current = await this.credentialRepo.get(id);
    const token = this.tokens.withKey(current.key);
    const salt = randomSalt();
    const updated = await this.credentialRepo.updateSecret(id, hashSecret(token.secret, salt), salt);
    credentialRegenerationsTotal.inc();
    getLogger().info({ credentialId: id }, 'Credential secret regenerated');
    return { credential: toPublicCredential(updated), plaintext: token.plaintext };
  }

  async deactivate(id: string): Promise<PublicCredential> {
    const updated = await this.credentialRepo.deactivate(id);
    getLogger().info({ credentialId: id }, 'Credential deactivated');
    return toPublicCredential(updated);
  }

  async get(id: string): Promise<PublicCredential> {
    return toPublicCredential(await this.credentialRepo.get(id));
  }

  async list(): Promise<PublicCredential[]> {
    const now = new Date();
    return (await this.credentialRepo.list()).map((c) => toPublicCredential(c, now));
  }

  async grantPermission(id: string, permission: Permission): Promise<void> {
    await this.credentialRepo.get(id);
    await this.grantRepo.grantToCredential(id, permission);
  }

  async createGroup(name: string, permissions: Permission[]): Promise<PermissionGroup> {
    return this.grantRepo.upsertGroup(name, permissions);
  }

  async addToGroup(id: string, groupName: string): Promise<void> {
    await this.credentialRepo.get(id);
    await this.grantRepo.addMember(id, groupName);
  }
}
