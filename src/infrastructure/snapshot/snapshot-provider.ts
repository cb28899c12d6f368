import { readFile, statfs } from 'node:fs/promises';
import { cpus, release, totalmem, type } from 'node:os';
import type { Logger } from 'pino';
import type { IdentifyRecord, InstanceStats, InstanceStatsSource, SnapshotSource } from '../../domain/index.js';
import type { AnalyticsConfig } from '../config/index.js';
import { computeInfos } from './infos.js';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export interface SystemFacts {
  distribution: string;
  kernel_version: string | null;
  cores: number;
  ram_size: number;
  disk_size: number | null;
  server_provider: string | null;
}

export interface SnapshotProviderOptions {
  config: AnalyticsConfig;
  stats: InstanceStatsSource;
  log: Logger;
  /** Overrides host detection. */
  system?: () => Promise<Omit<SystemFacts, 'server_provider'>>;
  now?: () => number;
}

async function distributionName(log: Logger): Promise<string> {
  try {
    const osRelease = await readFile('/etc/os-release', 'utf-8');
    const match = /^NAME="?([^"\n]+)"?$/m.exec(osRelease);
    if (match?.[1]) return match[1];
  } catch (err: unknown) {
    log.debug({ err }, 'No os-release file, reporting the OS type');
  }
  return type();
}

async function diskSize(path: string, log: Logger): Promise<number | null> {
  try {
    const fsStats = await statfs(path);
    return fsStats.blocks * fsStats.bsize;
  } catch (err: unknown) {
    log.debug({ err, path }, 'Disk size unavailable');
    return null;
  }
}

/**
 * Builds the per-flush `identify` record.
 *
 * Host facts are probed once, on first use, and kept for the lifetime of
 * the provider; a failed probe is retried on the next call. Instance statistics are collected fresh on every call; when
 * that fails there is no snapshot for the cycle.
 */
export class SnapshotProvider implements SnapshotSource {
  private readonly config: AnalyticsConfig;
  private readonly stats: InstanceStatsSource;
  private readonly log: Logger;
  private readonly probeSystem: () => Promise<Omit<SystemFacts, 'server_provider'>>;
  private readonly now: () => number;
  private readonly startedAt: number;
  private system: Promise<SystemFacts> | null = null;

  constructor(opts: SnapshotProviderOptions) {
    this.config = opts.config;
    this.stats = opts.stats;
    this.log = opts.log;
    this.now = opts.now ?? Date.now;
    this.startedAt = this.now();
    this.probeSystem = opts.system ?? (() => this.probeHost());
  }

  async snapshot(user_id: string): Promise<IdentifyRecord | null> {
    let stats: InstanceStats;
    try {
      stats = await this.stats.collect();
    } catch (err: unknown) {
      this.log.debug({ err }, 'Instance stats unavailable, no snapshot this cycle');
      return null;
    }

    return {
      type: 'identify',
      user_id,
      context: { app: { version: this.config.version } },
      traits: {
        start_since_days: Math.floor((this.now() - this.startedAt) / ONE_DAY_MS),
        system: await this.systemFacts(),
        stats: {
          database_size: stats.database_size,
          indexes_number: stats.indexes.length,
          documents_number: stats.indexes.map((index) => index.number_of_documents),
        },
        infos: computeInfos(this.config.server, stats.features),
      },
    };
  }

  private systemFacts(): Promise<SystemFacts> {
    this.system ??= this.probeSystem().then(
      (facts) => ({ ...facts, server_provider: this.config.server_provider }),
      (err: unknown) => {
        // Probe again on the next cycle.
        this.system = null;
        throw err;
      },
    );
    return this.system;
  }

  private async probeHost(): Promise<Omit<SystemFacts, 'server_provider'>> {
    return {
      distribution: await distributionName(this.log),
      kernel_version: release().split('-')[0] ?? null,
      cores: cpus().length,
      ram_size: totalmem(),
      disk_size: await diskSize(this.config.server.db_path, this.log),
    };
  }
}
