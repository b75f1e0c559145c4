/**
 * Lineage event model.
 *
 * Payloads keep the OpenLineage wire shape that the downstream lineage
 * store ingests, so the consumer can forward them untouched.
 */

export const LINEAGE_EVENT_TYPES = ['START', 'RUNNING', 'COMPLETE', 'FAIL', 'ABORT'] as const;

export type LineageEventType = (typeof LINEAGE_EVENT_TYPES)[number];

export type Facets = Record<string, unknown>;

/**
 * Logical dataset reference. `namespace` is the dataset's own namespace and
 * may belong to another tenant.
 */
export interface DatasetRef {
  readonly namespace: string;
  readonly name: string;
  readonly type?: string | undefined;
  readonly format?: string | undefined;
  readonly facets?: Facets | undefined;
}

export interface LineageJob {
  readonly namespace: string;
  readonly name: string;
  readonly facets?: Facets | undefined;
}

export interface LineageRun {
  readonly runId: string;
  readonly facets?: Facets | undefined;
}

export interface LineageEvent {
  readonly eventType: LineageEventType;
  readonly eventTime: string; // ISO-8601
  readonly run: LineageRun;
  readonly job: LineageJob;
  readonly inputs: readonly DatasetRef[];
  readonly outputs: readonly DatasetRef[];
  readonly producer?: string | undefined;
  readonly schemaURL?: string | undefined;
}
