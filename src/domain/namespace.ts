/**
 * Tenant namespace: the isolation boundary for one producing team.
 *
 * `name` is immutable once created; limits and retention are mutable.
 * Namespaces are never deleted by the pipeline.
 */
export interface TenantNamespace {
  readonly name: string;
  readonly display_name: string;
  readonly description: string;
  readonly owners: readonly string[];
  readonly daily_event_quota: number;
  readonly storage_retention_days: number;
  readonly tags: Readonly<Record<string, string>>;
  readonly created_at: Date;
  readonly updated_at: Date;
}

/** 3-50 chars, lowercase alphanumerics and dashes, no leading/trailing dash. */
export const NAMESPACE_NAME_RE = /^[a-z0-9][a-z0-9-]{1,48}[a-z0-9]$/;

export function isValidNamespaceName(name: string): boolean {
  return NAMESPACE_NAME_RE.test(name);
}
