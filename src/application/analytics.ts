import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createEnvelope } from '../domain/index.js';
import type {
  AggregateKind,
  DeliverySink,
  Envelope,
  InstanceStatsSource,
  TrackRecord,
} from '../domain/index.js';
import {
  createDeliverySink,
  findInstanceUid,
  SnapshotProvider,
  writeInstanceUid,
} from '../infrastructure/index.js';
import type { AnalyticsConfig, IdentityOptions, SinkFactory } from '../infrastructure/index.js';
import { AnalyticsActor } from './analytics-actor.js';
import { Mailbox } from './mailbox.js';

/** How many envelopes may wait for the actor before new ones are dropped. */
export const MAILBOX_CAPACITY = 100;

export const TOTAL_LAUNCH_USER = 'total_launch';
export const LAUNCHED_EVENT = 'Launched';

/**
 * What request handlers see of the telemetry subsystem.
 *
 * `publish` never throws and never waits.
 */
export interface Analytics {
  readonly instance_uid: string | null;
  /** Returns `false` when the event was not accepted. */
  publish<P extends object>(kind: AggregateKind<P>, payload: P, sources: Iterable<string>): boolean;
  close(): Promise<void>;
}

/** Used when telemetry is disabled or could not be set up. */
export class NoopAnalytics implements Analytics {
  readonly instance_uid: string | null;

  constructor(instance_uid: string | null = null) {
    this.instance_uid = instance_uid;
  }

  publish(): boolean {
    return false;
  }

  async close(): Promise<void> {}
}

export interface AggregatingAnalyticsOptions {
  instance_uid: string;
  mailbox: Mailbox<Envelope>;
  actor: AnalyticsActor;
  sink: DeliverySink;
  controller: AbortController;
  log: Logger;
}

/** Wraps each event in an envelope and hands it to the actor. */
export class AggregatingAnalytics implements Analytics {
  readonly instance_uid: string;
  private readonly mailbox: Mailbox<Envelope>;
  private readonly sink: DeliverySink;
  private readonly controller: AbortController;
  private readonly log: Logger;
  private readonly running: Promise<void>;

  constructor(opts: AggregatingAnalyticsOptions) {
    this.instance_uid = opts.instance_uid;
    this.mailbox = opts.mailbox;
    this.sink = opts.sink;
    this.controller = opts.controller;
    this.log = opts.log;
    this.running = opts.actor.start();
  }

  publish<P extends object>(kind: AggregateKind<P>, payload: P, sources: Iterable<string>): boolean {
    const envelope = createEnvelope(kind.bind(payload), { sources });
    const accepted = this.mailbox.offer(envelope);
    if (!accepted) {
      this.log.debug({ kind: kind.tag }, 'Analytics mailbox full, event dropped');
    }
    return accepted;
  }

  /** Stops the actor. Whatever was not flushed yet is lost. */
  async close(): Promise<void> {
    this.controller.abort();
    await this.running;
    try {
      await this.sink.close?.();
    } catch (err: unknown) {
      this.log.debug({ err }, 'Telemetry sink close failed');
    }
  }
}

export interface AnalyticsDeps {
  log: Logger;
  stats: InstanceStatsSource;
  sinkFactory?: SinkFactory;
  identity?: IdentityOptions;
  /** Aborting it stops the actor, same as `close()`. */
  signal?: AbortSignal;
}

function launchedRecord(user_id: string): TrackRecord {
  return { type: 'track', user_id, event: LAUNCHED_EVENT, properties: {} };
}

async function announceFirstLaunch(sink: DeliverySink, instance_uid: string, log: Logger): Promise<void> {
  try {
    await sink.push(launchedRecord(TOTAL_LAUNCH_USER));
    await sink.flush();
  } catch (err: unknown) {
    log.debug({ err }, 'First launch event not delivered');
  }
  // Sent with the first hourly flush.
  try {
    await sink.push(launchedRecord(instance_uid));
  } catch (err: unknown) {
    log.debug({ err }, 'Telemetry push failed');
  }
}

/**
 * Sets up telemetry for this process.
 *
 * Resolves to a {@link NoopAnalytics} when it is disabled by configuration
 * or when the delivery sink cannot be built. Never rejects.
 */
export async function createAnalytics(config: AnalyticsConfig, deps: AnalyticsDeps): Promise<Analytics> {
  const { log } = deps;

  if (config.no_analytics) {
    log.info('Analytics disabled');
    return new NoopAnalytics();
  }

  const identity: IdentityOptions = { ...deps.identity, log };
  const dbPath = config.server.db_path;
  const existing = await findInstanceUid(dbPath, identity);
  const instance_uid = existing ?? randomUUID();
  await writeInstanceUid(dbPath, instance_uid, identity);

  let sink: DeliverySink;
  try {
    sink = (deps.sinkFactory ?? createDeliverySink)(config, log);
  } catch (err: unknown) {
    log.warn({ err }, 'Telemetry sink could not be created, analytics disabled');
    return new NoopAnalytics(instance_uid);
  }

  if (existing === null) {
    await announceFirstLaunch(sink, instance_uid, log);
  }

  const controller = new AbortController();
  const { signal } = deps;
  if (signal) {
    const forwardAbort = (): void => controller.abort();
    if (signal.aborted) controller.abort();
    signal.addEventListener('abort', forwardAbort, { once: true });
    controller.signal.addEventListener('abort', () => signal.removeEventListener('abort', forwardAbort), {
      once: true,
    });
  }

  const mailbox = new Mailbox<Envelope>(MAILBOX_CAPACITY);
  const actor = new AnalyticsActor({
    mailbox,
    sink,
    user_id: instance_uid,
    log,
    snapshot: new SnapshotProvider({ config, stats: deps.stats, log }),
    intervalMs: config.flush_interval_ms,
    signal: controller.signal,
  });

  log.info({ instance_uid, transport: config.transport }, 'Analytics enabled');
  return new AggregatingAnalytics({ instance_uid, mailbox, actor, sink, controller, log });
}
