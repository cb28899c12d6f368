import type { Logger } from 'pino';
import type { AnalyticsRecord, DeliverySink, Envelope } from '../domain/index.js';
import { exportEnvelope, mergeEnvelopes } from '../domain/index.js';

/**
 * Holds at most one envelope per event kind between flushes.
 *
 * Only the analytics actor touches a store, so there is no locking:
 * `record()` and `drain()` are synchronous and Node never interleaves
 * them.
 */
export class AggregationStore {
  private envelopes: Map<string, Envelope> = new Map();
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  /**
   * Folds an envelope into the store.
   *
   * Returns `false` when it could not be merged with the stored envelope
   * of the same kind; the incoming event is then dropped and the stored
   * envelope is left as it was.
   */
  record(envelope: Envelope): boolean {
    const existing = this.envelopes.get(envelope.kind);
    if (existing === undefined) {
      this.envelopes.set(envelope.kind, envelope);
      return true;
    }

    const merged = mergeEnvelopes(existing, envelope);
    if (merged === null) {
      this.log.debug({ kind: envelope.kind }, 'Aggregate mismatch, event dropped');
      return false;
    }

    this.envelopes.set(envelope.kind, merged);
    return true;
  }

  get(kind: string): Envelope | undefined {
    return this.envelopes.get(kind);
  }

  get size(): number {
    return this.envelopes.size;
  }

  /** Takes every envelope out, leaving an empty store behind. */
  drain(): Envelope[] {
    const taken = this.envelopes;
    this.envelopes = new Map();
    return [...taken.values()];
  }

  /**
   * Flush cycle: snapshot first, then one track record per kind, then a
   * sink flush.
   *
   * The store is emptied before the first await, so envelopes recorded
   * while the sink is busy belong to the next cycle. Every sink failure
   * is discarded. Resolves to the number of track records pushed.
   */
  async drainAndExport(
    sink: DeliverySink,
    user_id: string,
    snapshot: AnalyticsRecord | null = null,
  ): Promise<number> {
    const envelopes = this.drain();

    if (snapshot !== null) {
      await this.push(sink, snapshot);
    }

    let pushed = 0;
    for (const envelope of envelopes) {
      let record: AnalyticsRecord | null;
      try {
        record = exportEnvelope(envelope, user_id);
      } catch (err: unknown) {
        this.log.debug({ err, kind: envelope.kind }, 'Aggregate export failed');
        continue;
      }
      if (record === null) continue;

      if (await this.push(sink, record)) pushed++;
    }

    try {
      await sink.flush();
    } catch (err: unknown) {
      this.log.debug({ err }, 'Telemetry flush failed');
    }

    this.log.debug({ kinds: envelopes.length, pushed }, 'Telemetry flushed');
    return pushed;
  }

  private async push(sink: DeliverySink, record: AnalyticsRecord): Promise<boolean> {
    try {
      await sink.push(record);
      return true;
    } catch (err: unknown) {
      this.log.debug({ err, type: record.type }, 'Telemetry push failed');
      return false;
    }
  }
}
