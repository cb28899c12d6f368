/**
 * Core types for the telemetry pipeline.
 *
 * These describe what the aggregation engine handles and what it hands to
 * a delivery sink. They carry no framework dependencies.
 */

/** Sectioned key/value payload of an exported record. */
export type EventProperties = Record<string, unknown>;

/** Usage event: one rolled-up kind for one flush interval. */
export interface TrackRecord {
  readonly type: 'track';
  readonly user_id: string;
  readonly event: string;
  readonly properties: EventProperties;
  /** ISO-8601; first time the underlying data was observed. */
  readonly timestamp?: string;
}

/** Instance snapshot: host facts, statistics and configuration. */
export interface IdentifyRecord {
  readonly type: 'identify';
  readonly user_id: string;
  readonly traits: EventProperties;
  readonly context?: EventProperties;
}

export type AnalyticsRecord = TrackRecord | IdentifyRecord;

/**
 * Delivery sink contract.
 *
 * Both calls are best-effort: callers discard rejections.
 */
export interface DeliverySink {
  push(record: AnalyticsRecord): Promise<void>;
  flush(): Promise<void>;
  /** Releases the underlying transport, if it holds one. */
  close?(): Promise<void>;
}

/**
 * Produces the per-flush instance snapshot.
 * Resolves to `null` when no snapshot can be taken this cycle.
 */
export interface SnapshotSource {
  snapshot(user_id: string): Promise<IdentifyRecord | null>;
}

/** Runtime-togglable features reported in the snapshot. */
export interface RuntimeFeatures {
  readonly vector_store: boolean;
  readonly metrics: boolean;
  readonly logs_route: boolean;
  readonly edit_documents_by_function: boolean;
  readonly contains_filter: boolean;
}

/** Instance-level statistics, gathered fresh for every snapshot. */
export interface InstanceStats {
  readonly database_size: number;
  readonly indexes: ReadonlyArray<{ readonly uid: string; readonly number_of_documents: number }>;
  readonly features: RuntimeFeatures;
}

/** Host hook that reports the current instance statistics. */
export interface InstanceStatsSource {
  collect(): Promise<InstanceStats>;
}

/**
 * Capability every event kind implements.
 *
 * `merge` must be associative and commutative, and must carry every field
 * of the payload over. `export` drains the payload into a record.
 */
export interface AggregateDefinition<P extends object> {
  /** Stable, unique discriminant. Two payloads merge iff their tags match. */
  readonly tag: string;
  /** Event name used at export time. */
  readonly name: string;
  merge(a: P, b: P): P;
  export(payload: P): EventProperties;
}
