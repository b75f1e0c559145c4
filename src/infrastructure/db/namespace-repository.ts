import { asc, eq } from 'drizzle-orm';
import type { TenantNamespace } from '../../domain/index.js';
import type { NamespacePatch, NamespaceRepository } from '../../application/ports.js';
import type { Database } from './client.js';
import { namespaces } from './schema.js';

type NamespaceRow = typeof namespaces.$inferSelect;

function toNamespace(row: NamespaceRow): TenantNamespace {
  return {
    name: row.name,
    display_name: row.display_name,
    description: row.description,
    owners: row.owners,
    daily_event_quota: row.daily_event_quota,
    storage_retention_days: row.storage_retention_days,
    tags: row.tags,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/** Namespace registry on the `namespaces` table. */
export class DrizzleNamespaceRepository implements NamespaceRepository {
  constructor(private readonly db: Database) {}

  async findByName(name: string): Promise<TenantNamespace | undefined> {
    const rows = await this.db.select().from(namespaces).where(eq(namespaces.name, name)).limit(1);
    const row = rows[0];
    return row ? toNamespace(row) : undefined;
  }

  async list(): Promise<TenantNamespace[]> {
    const rows = await this.db.select().from(namespaces).orderBy(asc(namespaces.name));
    return rows.map(toNamespace);
  }

  async insert(namespace: TenantNamespace): Promise<TenantNamespace | undefined> {
    const rows = await this.db
      .insert(namespaces)
      .values({
        name: namespace.name,
        display_name: namespace.display_name,
        description: namespace.description,
        owners: [...namespace.owners],
        daily_event_quota: namespace.daily_event_quota,
        storage_retention_days: namespace.storage_retention_days,
        tags: { ...namespace.tags },
        created_at: namespace.created_at,
        updated_at: namespace.updated_at,
      })
      .onConflictDoNothing({ target: namespaces.name })
      .returning();

    const row = rows[0];
    return row ? toNamespace(row) : undefined;
  }

  async update(name: string, patch: NamespacePatch): Promise<TenantNamespace | undefined> {
    const rows = await this.db
      .update(namespaces)
      .set({
        display_name: patch.display_name,
        description: patch.description,
        owners: patch.owners,
        daily_event_quota: patch.daily_event_quota,
        storage_retention_days: patch.storage_retention_days,
        tags: patch.tags,
        updated_at: new Date(),
      })
      .where(eq(namespaces.name, name))
      .returning();

    const row = rows[0];
    return row ? toNamespace(row) : undefined;
  }
}
