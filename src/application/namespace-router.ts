import type { BaseLogger } from 'pino';
import {
  isValidNamespaceName,
  QuotaExceededError,
  TOPIC_BY_KIND,
  UnknownNamespaceError,
} from '../domain/index.js';
import type { TenantNamespace, TopicRole, ValidatedEvent } from '../domain/index.js';
import { autoCreatedNamespace } from './namespace-admin.js';
import type { NamespaceDefaults } from './namespace-admin.js';
import type { NamespaceRepository, QuotaCounter } from './ports.js';

export interface RoutingDecision {
  readonly tenant_namespace: string;
  readonly topic: TopicRole;
  readonly partition_key: string;
  /** UTC date the event was counted against. */
  readonly day: string;
  readonly quota_used: number;
  readonly quota_limit: number;
}

export type RoutingOutcome =
  | { readonly ok: true; readonly decision: RoutingDecision }
  | { readonly ok: false; readonly error: UnknownNamespaceError | QuotaExceededError };

export interface NamespaceRouterOptions {
  namespaces: NamespaceRepository;
  quota: QuotaCounter;
  autoCreate: boolean;
  defaults: NamespaceDefaults;
  log: BaseLogger;
  /** How long a looked-up namespace is reused before re-reading it. */
  cacheTtlMs?: number | undefined;
  now?: (() => Date) | undefined;
}

interface CachedNamespace {
  namespace: TenantNamespace;
  expiresAt: number;
}

const DEFAULT_CACHE_TTL_MS = 5_000;

/** `YYYY-MM-DD` of `date` in UTC; the quota window key. */
export function utcDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Co-location key: a run's lineage events, a trace's spans and a
 * service's metrics each share one partition.
 */
export function partitionKeyOf(validated: ValidatedEvent): string {
  switch (validated.kind) {
    case 'lineage':
      return validated.event.run.runId.toLowerCase();
    case 'span':
      return validated.event.trace_id.toLowerCase();
    case 'metric':
      return validated.event.service_name;
  }
}

/**
 * Resolves the tenant, enforces its daily quota and decides where an
 * event goes.
 *
 * The quota is counted here, before publication. An event that later
 * fails to publish still consumes quota.
 */
export class NamespaceRouter {
  private readonly cache = new Map<string, CachedNamespace>();
  private readonly cacheTtlMs: number;
  private readonly now: () => Date;

  constructor(private readonly options: NamespaceRouterOptions) {
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  async route(tenantNamespace: string, validated: ValidatedEvent): Promise<RoutingOutcome> {
    const namespace = await this.resolve(tenantNamespace);
    if (!namespace.ok) return namespace;

    const limit = namespace.value.daily_event_quota;
    const day = utcDayKey(this.now());
    const counted = await this.options.quota.tryIncrement(tenantNamespace, day, limit);

    if (!counted.admitted) {
      this.options.log.warn(
        { namespace: tenantNamespace, day, limit, used: counted.used },
        'Daily event quota exhausted',
      );
      return {
        ok: false,
        error: new QuotaExceededError(tenantNamespace, limit, counted.used, day),
      };
    }

    return {
      ok: true,
      decision: {
        tenant_namespace: tenantNamespace,
        topic: TOPIC_BY_KIND[validated.kind],
        partition_key: partitionKeyOf(validated),
        day,
        quota_used: counted.used,
        quota_limit: limit,
      },
    };
  }

  /** Drops the cached copy of a namespace after its limits change. */
  invalidate(name: string): void {
    this.cache.delete(name);
  }

  private async resolve(
    name: string,
  ): Promise<{ ok: true; value: TenantNamespace } | { ok: false; error: UnknownNamespaceError }> {
    const nowMs = this.now().getTime();
    const cached = this.cache.get(name);
    if (cached && cached.expiresAt > nowMs) {
      return { ok: true, value: cached.namespace };
    }

    let namespace = await this.options.namespaces.findByName(name);

    if (namespace === undefined) {
      if (!this.options.autoCreate) {
        return { ok: false, error: new UnknownNamespaceError(name) };
      }
      if (!isValidNamespaceName(name)) {
        return {
          ok: false,
          error: new UnknownNamespaceError(name, 'name is not a valid namespace identifier'),
        };
      }

      const created = await this.options.namespaces.insert(
        autoCreatedNamespace(name, this.options.defaults, this.now()),
      );
      // A concurrent request may have created it first.
      namespace = created ?? (await this.options.namespaces.findByName(name));
      if (namespace === undefined) {
        return { ok: false, error: new UnknownNamespaceError(name, 'auto-creation failed') };
      }
      if (created) {
        this.options.log.info({ namespace: name }, 'Namespace auto-created on first event');
      }
    }

    this.cache.set(name, { namespace, expiresAt: nowMs + this.cacheTtlMs });
    return { ok: true, value: namespace };
  }
}
