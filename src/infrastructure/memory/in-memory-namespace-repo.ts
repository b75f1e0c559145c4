import type { TenantNamespace } from '../../domain/index.js';
import type { NamespacePatch, NamespaceRepository } from '../../application/ports.js';

/**
 * Map-backed namespace registry for tests and single-process setups.
 * Returned objects are copies; callers cannot mutate the stored records.
 */
export class InMemoryNamespaceRepository implements NamespaceRepository {
  private readonly items = new Map<string, TenantNamespace>();

  constructor(
    seed: readonly TenantNamespace[] = [],
    private readonly now: () => Date = () => new Date(),
  ) {
    for (const ns of seed) this.items.set(ns.name, clone(ns));
  }

  async findByName(name: string): Promise<TenantNamespace | undefined> {
    const ns = this.items.get(name);
    return ns ? clone(ns) : undefined;
  }

  async list(): Promise<TenantNamespace[]> {
    return [...this.items.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(clone);
  }

  async insert(namespace: TenantNamespace): Promise<TenantNamespace | undefined> {
    if (this.items.has(namespace.name)) return undefined;
    this.items.set(namespace.name, clone(namespace));
    return clone(namespace);
  }

  async update(name: string, patch: NamespacePatch): Promise<TenantNamespace | undefined> {
    const existing = this.items.get(name);
    if (!existing) return undefined;

    const updated: TenantNamespace = {
      ...existing,
      display_name: patch.display_name ?? existing.display_name,
      description: patch.description ?? existing.description,
      owners: patch.owners ?? existing.owners,
      daily_event_quota: patch.daily_event_quota ?? existing.daily_event_quota,
      storage_retention_days: patch.storage_retention_days ?? existing.storage_retention_days,
      tags: patch.tags ?? existing.tags,
      updated_at: this.now(),
    };
    this.items.set(name, updated);
    return clone(updated);
  }
}

function clone(ns: TenantNamespace): TenantNamespace {
  return { ...ns, owners: [...ns.owners], tags: { ...ns.tags } };
}
