import type { BaseLogger } from 'pino';
import { isValidNamespaceName } from '../domain/index.js';
import type { TenantNamespace } from '../domain/index.js';
import type { NamespacePatch, NamespaceRepository } from './ports.js';

export interface NamespaceDefaults {
  dailyEventQuota: number;
  retentionDays: number;
}

export interface CreateNamespaceInput {
  name: string;
  display_name?: string | undefined;
  description?: string | undefined;
  owners?: string[] | undefined;
  daily_event_quota?: number | undefined;
  storage_retention_days?: number | undefined;
  tags?: Record<string, string> | undefined;
}

export type CreateNamespaceResult =
  | { readonly ok: true; readonly namespace: TenantNamespace }
  | { readonly ok: false; readonly reason: 'invalid_name' | 'already_exists' };

/** Builds a namespace record, filling unspecified limits from defaults. */
export function newNamespace(
  input: CreateNamespaceInput,
  defaults: NamespaceDefaults,
  now: Date = new Date(),
): TenantNamespace {
  return {
    name: input.name,
    display_name: input.display_name ?? input.name,
    description: input.description ?? '',
    owners: input.owners ?? [],
    daily_event_quota: input.daily_event_quota ?? defaults.dailyEventQuota,
    storage_retention_days: input.storage_retention_days ?? defaults.retentionDays,
    tags: input.tags ?? {},
    created_at: now,
    updated_at: now,
  };
}

/** Namespace registered on a tenant's first event. */
export function autoCreatedNamespace(
  name: string,
  defaults: NamespaceDefaults,
  now: Date = new Date(),
): TenantNamespace {
  return newNamespace(
    {
      name,
      display_name: `Auto-created: ${name}`,
      description: `Automatically created namespace for ${name}`,
      tags: { auto_created: 'true' },
    },
    defaults,
    now,
  );
}

/**
 * Namespace administration use cases (create / list / get / update).
 *
 * `onChange` fires after a successful update so in-process caches can
 * drop their copy of the namespace.
 */
export class NamespaceAdmin {
  constructor(
    private readonly repo: NamespaceRepository,
    private readonly defaults: NamespaceDefaults,
    private readonly log: BaseLogger,
    private readonly onChange: (name: string) => void = () => {},
  ) {}

  async create(input: CreateNamespaceInput): Promise<CreateNamespaceResult> {
    if (!isValidNamespaceName(input.name)) {
      return { ok: false, reason: 'invalid_name' };
    }

    const inserted = await this.repo.insert(newNamespace(input, this.defaults));
    if (inserted === undefined) {
      return { ok: false, reason: 'already_exists' };
    }

    this.log.info({ namespace: inserted.name, owners: inserted.owners }, 'Namespace created');
    return { ok: true, namespace: inserted };
  }

  async list(): Promise<TenantNamespace[]> {
    return this.repo.list();
  }

  async get(name: string): Promise<TenantNamespace | null> {
    const ns = await this.repo.findByName(name);
    return ns ?? null;
  }

  async update(name: string, patch: NamespacePatch): Promise<TenantNamespace | null> {
    const updated = await this.repo.update(name, patch);
    if (updated === undefined) return null;

    this.onChange(name);
    this.log.info({ namespace: name, fields: Object.keys(patch) }, 'Namespace updated');
    return updated;
  }

  /** Registers `name` with default settings if it does not exist yet. */
  async ensure(name: string, displayName: string): Promise<TenantNamespace> {
    const existing = await this.repo.findByName(name);
    if (existing) return existing;

    const inserted = await this.repo.insert(
      newNamespace({ name, display_name: displayName }, this.defaults),
    );
    if (inserted) {
      this.log.info({ namespace: name }, 'Namespace seeded');
      return inserted;
    }

    // Lost a race with another replica; the row exists now.
    const raced = await this.repo.findByName(name);
    if (!raced) throw new Error(`Namespace '${name}' vanished after conflicting insert`);
    return raced;
  }
}
