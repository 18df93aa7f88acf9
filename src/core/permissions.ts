import type { Action, Permission, Principal } from './types.js';

function permissionKey(resource: string, action: Action): string {
  return `${resource}\u0000${action}`;
}

/** Union of the principal's direct grants and the grants of every group it belongs to. */
export function effectivePermissions(principal: Principal): Permission[] {
  const seen = new Map<string, Permission>();
  const sources = [principal.permissions, ...principal.groups.map((g) => g.permissions)];
  for (const list of sources) {
    for (const p of list) {
      const key = permissionKey(p.resource, p.action);
      if (!seen.has(key)) seen.set(key, { resource: p.resource, action: p.action });
    }
  }
  return [...seen.values()];
}

export function hasPermission(principal: Principal, resource: string, action: Action): boolean {
  return effectivePermissions(principal).some((p) => p.resource === resource && p.action === action);
}

export function parsePermission(value: string): Permission {
  const idx = value.lastIndexOf(':');
  if (idx <= 0 || idx === value.length - 1) {
    throw new Error(`Invalid permission "${value}", expected <resource>:<action>`);
  }
  return { resource: value.slice(0, idx), action: value.slice(idx + 1) };
}
