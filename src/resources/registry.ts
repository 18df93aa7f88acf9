import type { FieldMeta, ResourceDescriptor } from './descriptor.js';

export interface ReverseRelation {
  // Resource holding the relation field.
  resource: string;
  field: FieldMeta;
  relatedName: string;
}

/**
 * Name-keyed set of exposed resources. Registration is insert-if-absent and
 * stops once the registry is frozen at startup.
 */
export class ResourceRegistry {
  private readonly descriptors = new Map<string, ResourceDescriptor>();
  private frozen = false;

  register(descriptor: ResourceDescriptor): boolean {
    if (this.frozen) throw new Error(`Registry is frozen; cannot register ${descriptor.name}`);
    if (this.descriptors.has(descriptor.name)) return false;
    this.descriptors.set(descriptor.name, descriptor);
    return true;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): ResourceDescriptor | undefined {
    return this.descriptors.get(name);
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  list(): ResourceDescriptor[] {
    return [...this.descriptors.values()];
  }

  reverseRelations(name: string): ReverseRelation[] {
    const out: ReverseRelation[] = [];
    for (const d of this.descriptors.values()) {
      for (const field of d.getFields()) {
        if (field.relation?.target === name) {
          out.push({ resource: d.name, field, relatedName: field.relation.relatedName });
        }
      }
    }
    return out;
  }
}
