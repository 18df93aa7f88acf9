import { loadConfig, type PermissionPolicyConfig } from '../config/index.js';
import { permissionDenied } from '../core/errors.js';
import { STANDARD_ACTIONS, type Action, type Principal } from '../core/types.js';
import { permissionDenialsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import type { ResourceDescriptor } from '../resources/descriptor.js';

function isStandard(action: Action): boolean {
  return STANDARD_ACTIONS.some((a) => a === action);
}

export class PermissionGate {
  constructor(private readonly policy: PermissionPolicyConfig = loadConfig().permissions) {}

  check(principal: Principal | null, descriptor: ResourceDescriptor, action: Action): boolean {
    if (!principal) return this.policy.anonymous === 'allow';
    if (!descriptor.getPermission) return this.policy.undeclaredPolicy === 'allow';
    if (!isStandard(action)) return this.policy.unknownAction === 'allow';
    return descriptor.getPermission(principal, action);
  }

  /** Throws `permission_denied` with details `{ action, resource }`. */
  require(principal: Principal | null, descriptor: ResourceDescriptor, action: Action): void {
    if (this.check(principal, descriptor, action)) return;
    permissionDenialsTotal.inc({ action });
    getLogger().info(
      { principalId: principal?.id ?? null, resource: descriptor.name, action },
      'Permission denied',
    );
    throw permissionDenied(action, descriptor.name);
  }
}
