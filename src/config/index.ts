import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const policy = z.enum(['allow', 'deny']);

const ConfigSchema = z.object({
  database: z.object({
    client: z.literal('better-sqlite3'),
    filename: z.string().min(1),
  }),
  credentials: z.object({
    prefix: z
      .string()
      .min(1)
      .regex(/^[a-z0-9]+$/, 'prefix must be lowercase alphanumeric'),
    defaultLifetimeDays: z.number().int().positive().default(90),
  }),
  permissions: z.object({
    anonymous: policy.default('allow'),
    undeclaredPolicy: policy.default('allow'),
    unknownAction: policy.default('allow'),
  }),
  limits: z.object({
    listDefault: z.number().int().positive().default(100),
    listMax: z.number().int().positive().default(1000),
    bulkMax: z.number().int().positive().default(500),
    childItems: z.number().int().positive().default(100),
    relatedPreview: z.number().int().positive().default(10),
    historyDefault: z.number().int().positive().default(50),
    autocompleteDefault: z.number().int().positive().default(20),
    auditMessageLength: z.number().int().positive().default(500),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type PermissionPolicyConfig = AppConfig['permissions'];
export type LimitsConfig = AppConfig['limits'];

function section(fileRaw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = fileRaw[key];
  return value && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function loadConfig(configPath = 'gateway.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(full, 'utf8'));
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) fileRaw = Object.fromEntries(Object.entries(parsed));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  const merged = {
    database: {
      client: 'better-sqlite3',
      filename: process.env.DATABASE_FILE || './data/gateway.db',
      ...section(fileRaw, 'database'),
    },
    credentials: {
      prefix: process.env.CREDENTIAL_PREFIX || 'rgw',
      defaultLifetimeDays: numberFromEnv('CREDENTIAL_LIFETIME_DAYS') ?? 90,
      ...section(fileRaw, 'credentials'),
    },
    permissions: {
      anonymous: process.env.PERMISSION_ANONYMOUS || 'allow',
      undeclaredPolicy: process.env.PERMISSION_UNDECLARED || 'allow',
      unknownAction: process.env.PERMISSION_UNKNOWN_ACTION || 'allow',
      ...section(fileRaw, 'permissions'),
    },
    limits: { ...section(fileRaw, 'limits') },
    logging: { level: process.env.LOG_LEVEL || 'info', json: true, ...section(fileRaw, 'logging') },
  };
  return ConfigSchema.parse(merged);
}
