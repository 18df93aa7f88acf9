import { invalidInput } from '../core/errors.js';
import { OPERATIONS, type Operation } from '../core/types.js';

export const FIND_RESOURCES = 'find_resources';

export type ParsedCommand =
  | { kind: 'find_resources' }
  | { kind: 'resource'; operation: Operation; resource: string };

function toOperation(value: string): Operation | undefined {
  return OPERATIONS.find((op) => op === value);
}

/**
 * `<operation>_<resource>`, split on the first underscore so resource names
 * may contain underscores themselves.
 */
export function parseCommand(name: string): ParsedCommand {
  if (name === FIND_RESOURCES) return { kind: 'find_resources' };
  const idx = name.indexOf('_');
  if (idx <= 0 || idx === name.length - 1) {
    throw invalidInput(`Malformed command "${name}", expected <operation>_<resource>`);
  }
  const operation = toOperation(name.slice(0, idx));
  if (!operation) {
    throw invalidInput(`Unknown operation "${name.slice(0, idx)}"`, { operations: [...OPERATIONS] });
  }
  return { kind: 'resource', operation, resource: name.slice(idx + 1) };
}
