import type { Logger } from 'pino';
import type { DeliverySink, Envelope, IdentifyRecord, SnapshotSource } from '../domain/index.js';
import { AggregationStore } from './aggregation-store.js';
import type { Mailbox } from './mailbox.js';

export const ONE_HOUR_MS = 60 * 60 * 1000;

export type ActorState = 'idle' | 'draining';

export interface AnalyticsActorOptions {
  mailbox: Mailbox<Envelope>;
  sink: DeliverySink;
  user_id: string;
  log: Logger;
  snapshot?: SnapshotSource | undefined;
  store?: AggregationStore | undefined;
  /** Flush period. The first flush happens one full period after `start()`. */
  intervalMs?: number | undefined;
  /** Stops the loop and the timer when aborted. */
  signal?: AbortSignal | undefined;
}

/**
 * Single consumer of the analytics mailbox.
 *
 * One loop reacts to two triggers:
 * 1. mailbox arrival → record the envelope in the store
 * 2. timer tick      → snapshot, drain the store, export through the sink
 *
 * Only this loop touches the store. The timer is unref'd: it never keeps
 * the host process alive on its own.
 */
export class AnalyticsActor {
  private readonly mailbox: Mailbox<Envelope>;
  private readonly sink: DeliverySink;
  private readonly user_id: string;
  private readonly log: Logger;
  private readonly snapshotSource: SnapshotSource | undefined;
  private readonly intervalMs: number;
  private readonly signal: AbortSignal | undefined;

  readonly store: AggregationStore;

  private timer: ReturnType<typeof setInterval> | null = null;
  private tickPending = false;
  private running: Promise<void> | null = null;
  private currentState: ActorState = 'idle';
  private readonly onAbort = (): void => this.stopTimer();

  constructor(opts: AnalyticsActorOptions) {
    this.mailbox = opts.mailbox;
    this.sink = opts.sink;
    this.user_id = opts.user_id;
    this.log = opts.log;
    this.snapshotSource = opts.snapshot;
    this.store = opts.store ?? new AggregationStore(opts.log);
    this.intervalMs = opts.intervalMs ?? ONE_HOUR_MS;
    this.signal = opts.signal;
  }

  get state(): ActorState {
    return this.currentState;
  }

  /**
   * Starts the timer and the loop. Calling it again is a no-op.
   * The returned promise settles only when the signal aborts.
   */
  start(): Promise<void> {
    if (this.running) return this.running;

    this.timer = setInterval(() => {
      this.tickPending = true;
      this.mailbox.wake();
    }, this.intervalMs);
    this.timer.unref();

    if (this.signal?.aborted) this.stopTimer();
    this.signal?.addEventListener('abort', this.onAbort, { once: true });

    this.running = this.run().catch((err: unknown) => {
      this.log.error({ err }, 'Analytics loop crashed');
      this.stopTimer();
    });
    return this.running;
  }

  /** One flush cycle: snapshot, drain, export, sink flush. */
  async flush(): Promise<void> {
    let snapshot: IdentifyRecord | null = null;
    if (this.snapshotSource) {
      try {
        snapshot = await this.snapshotSource.snapshot(this.user_id);
      } catch (err: unknown) {
        this.log.debug({ err }, 'Snapshot failed, skipping it this cycle');
      }
    }
    await this.store.drainAndExport(this.sink, this.user_id, snapshot);
  }

  private async run(): Promise<void> {
    this.log.info({ intervalMs: this.intervalMs, capacity: this.mailbox.capacity }, 'Analytics actor started');

    while (!this.signal?.aborted) {
      if (this.tickPending) {
        this.tickPending = false;
        this.currentState = 'draining';
        await this.flush();
        this.currentState = 'idle';
        continue;
      }

      const envelope = this.mailbox.poll();
      if (envelope !== undefined) {
        this.currentState = 'draining';
        try {
          this.store.record(envelope);
        } catch (err: unknown) {
          this.log.error({ err, kind: envelope.kind }, 'Failed to record analytics event, dropping it');
        }
        this.currentState = 'idle';
        continue;
      }

      await this.mailbox.wait();
    }

    this.signal?.removeEventListener('abort', this.onAbort);
    this.log.info('Analytics actor stopped');
  }

  private stopTimer(): void {
    this.signal?.removeEventListener('abort', this.onAbort);
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.mailbox.wake();
  }
}
