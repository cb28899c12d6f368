import { z } from 'zod';

export type TelemetryTransport = 'http' | 'redis';

export type LogMode = 'human' | 'json';

/**
 * Server options that end up, reduced, in the snapshot `infos` section.
 */
export interface ServerOptions {
  env: 'development' | 'production';
  db_path: string;
  http_addr: string;
  config_file_path: string | null;
  import_dump: string | null;
  ignore_missing_dump: boolean;
  ignore_dump_if_db_exists: boolean;
  dump_dir: string | null;
  import_snapshot: string | null;
  ignore_missing_snapshot: boolean;
  ignore_snapshot_if_db_exists: boolean;
  snapshot_dir: string | null;
  schedule_snapshot: number | null;
  task_webhook_url: string | null;
  task_webhook_authorization_header: string | null;
  ssl_auth_path: string | null;
  ssl_cert_path: string | null;
  ssl_key_path: string | null;
  ssl_ocsp_path: string | null;
  ssl_require_auth: boolean;
  ssl_resumption: boolean;
  ssl_tickets: boolean;
  log_level: string;
  max_indexing_memory: number | null;
  max_indexing_threads: number | null;
  http_payload_size_limit: number;
  experimental_enable_metrics: boolean;
  experimental_enable_logs_route: boolean;
  experimental_contains_filter: boolean;
  experimental_search_queue_size: number;
  experimental_drop_search_after: number;
  experimental_nb_searches_per_core: number;
  experimental_logs_mode: LogMode;
  experimental_replication_parameters: boolean;
  experimental_reduce_indexing_memory_usage: boolean;
  experimental_max_number_of_batched_tasks: number;
  /** Whether the host runs embedders on a GPU. */
  gpu_enabled: boolean;
}

export interface AnalyticsConfig {
  no_analytics: boolean;
  version: string;
  server_provider: string | null;
  transport: TelemetryTransport;
  endpoint: string;
  write_key: string;
  redis_url: string;
  flush_interval_ms: number;
  server: ServerOptions;
}

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = {
  no_analytics: false,
  version: '0.1.0',
  server_provider: null,
  transport: 'http',
  endpoint: 'https://telemetry.search.example',
  write_key: 'search-telemetry-write-key',
  redis_url: 'redis://localhost:6379',
  flush_interval_ms: 3_600_000,
  server: {
    env: 'development',
    db_path: './data.ms',
    http_addr: 'localhost:7700',
    config_file_path: null,
    import_dump: null,
    ignore_missing_dump: false,
    ignore_dump_if_db_exists: false,
    dump_dir: null,
    import_snapshot: null,
    ignore_missing_snapshot: false,
    ignore_snapshot_if_db_exists: false,
    snapshot_dir: null,
    schedule_snapshot: null,
    task_webhook_url: null,
    task_webhook_authorization_header: null,
    ssl_auth_path: null,
    ssl_cert_path: null,
    ssl_key_path: null,
    ssl_ocsp_path: null,
    ssl_require_auth: false,
    ssl_resumption: false,
    ssl_tickets: false,
    log_level: 'info',
    max_indexing_memory: null,
    max_indexing_threads: null,
    http_payload_size_limit: 100_000_000,
    experimental_enable_metrics: false,
    experimental_enable_logs_route: false,
    experimental_contains_filter: false,
    experimental_search_queue_size: 1000,
    experimental_drop_search_after: 60,
    experimental_nb_searches_per_core: 4,
    experimental_logs_mode: 'human',
    experimental_replication_parameters: false,
    experimental_reduce_indexing_memory_usage: false,
    experimental_max_number_of_batched_tasks: Number.MAX_SAFE_INTEGER,
    gpu_enabled: false,
  },
};

const D = DEFAULT_ANALYTICS_CONFIG;

/** `"true"`/`"1"` and `"false"`/`"0"`; anything else falls back. */
const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1')
    .catch(fallback);

const text = (fallback: string) => z.string().trim().min(1).catch(fallback);

const optionalText = z.string().trim().min(1).nullable().catch(null);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const optionalPositiveInt = z.coerce.number().int().positive().nullable().catch(null);

const envSchema = z.object({
  SEARCH_NO_ANALYTICS: flag(D.no_analytics),
  SEARCH_VERSION: text(D.version),
  SEARCH_SERVER_PROVIDER: optionalText,
  SEARCH_TELEMETRY_TRANSPORT: z.enum(['http', 'redis']).catch(D.transport),
  SEARCH_TELEMETRY_ENDPOINT: z.string().url().catch(D.endpoint),
  SEARCH_TELEMETRY_WRITE_KEY: text(D.write_key),
  SEARCH_TELEMETRY_REDIS_URL: z.string().url().catch(D.redis_url),
  SEARCH_TELEMETRY_FLUSH_INTERVAL_MS: positiveInt(D.flush_interval_ms),

  SEARCH_ENV: z.enum(['development', 'production']).catch(D.server.env),
  SEARCH_DB_PATH: text(D.server.db_path),
  SEARCH_HTTP_ADDR: text(D.server.http_addr),
  SEARCH_CONFIG_FILE_PATH: optionalText,
  SEARCH_IMPORT_DUMP: optionalText,
  SEARCH_IGNORE_MISSING_DUMP: flag(D.server.ignore_missing_dump),
  SEARCH_IGNORE_DUMP_IF_DB_EXISTS: flag(D.server.ignore_dump_if_db_exists),
  SEARCH_DUMP_DIR: optionalText,
  SEARCH_IMPORT_SNAPSHOT: optionalText,
  SEARCH_IGNORE_MISSING_SNAPSHOT: flag(D.server.ignore_missing_snapshot),
  SEARCH_IGNORE_SNAPSHOT_IF_DB_EXISTS: flag(D.server.ignore_snapshot_if_db_exists),
  SEARCH_SNAPSHOT_DIR: optionalText,
  SEARCH_SCHEDULE_SNAPSHOT: optionalPositiveInt,
  SEARCH_TASK_WEBHOOK_URL: z.string().url().nullable().catch(null),
  SEARCH_TASK_WEBHOOK_AUTHORIZATION_HEADER: optionalText,
  SEARCH_SSL_AUTH_PATH: optionalText,
  SEARCH_SSL_CERT_PATH: optionalText,
  SEARCH_SSL_KEY_PATH: optionalText,
  SEARCH_SSL_OCSP_PATH: optionalText,
  SEARCH_SSL_REQUIRE_AUTH: flag(D.server.ssl_require_auth),
  SEARCH_SSL_RESUMPTION: flag(D.server.ssl_resumption),
  SEARCH_SSL_TICKETS: flag(D.server.ssl_tickets),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).catch('info'),
  SEARCH_MAX_INDEXING_MEMORY: optionalPositiveInt,
  SEARCH_MAX_INDEXING_THREADS: optionalPositiveInt,
  SEARCH_HTTP_PAYLOAD_SIZE_LIMIT: positiveInt(D.server.http_payload_size_limit),
  SEARCH_EXPERIMENTAL_ENABLE_METRICS: flag(D.server.experimental_enable_metrics),
  SEARCH_EXPERIMENTAL_ENABLE_LOGS_ROUTE: flag(D.server.experimental_enable_logs_route),
  SEARCH_EXPERIMENTAL_CONTAINS_FILTER: flag(D.server.experimental_contains_filter),
  SEARCH_EXPERIMENTAL_SEARCH_QUEUE_SIZE: positiveInt(D.server.experimental_search_queue_size),
  SEARCH_EXPERIMENTAL_DROP_SEARCH_AFTER: positiveInt(D.server.experimental_drop_search_after),
  SEARCH_EXPERIMENTAL_NB_SEARCHES_PER_CORE: positiveInt(D.server.experimental_nb_searches_per_core),
  SEARCH_EXPERIMENTAL_LOGS_MODE: z.enum(['human', 'json']).catch(D.server.experimental_logs_mode),
  SEARCH_EXPERIMENTAL_REPLICATION_PARAMETERS: flag(D.server.experimental_replication_parameters),
  SEARCH_EXPERIMENTAL_REDUCE_INDEXING_MEMORY_USAGE: flag(D.server.experimental_reduce_indexing_memory_usage),
  SEARCH_EXPERIMENTAL_MAX_NUMBER_OF_BATCHED_TASKS: positiveInt(D.server.experimental_max_number_of_batched_tasks),
  SEARCH_GPU_ENABLED: flag(D.server.gpu_enabled),
});

/**
 * Reads the analytics and server configuration from environment variables.
 *
 * Every variable is optional. A value that does not validate falls back to
 * its default instead of failing startup.
 */
export function loadAnalyticsConfig(
  env: Record<string, string | undefined> = process.env,
): AnalyticsConfig {
  const e = envSchema.parse(env);

  return {
    no_analytics: e.SEARCH_NO_ANALYTICS,
    version: e.SEARCH_VERSION,
    server_provider: e.SEARCH_SERVER_PROVIDER,
    transport: e.SEARCH_TELEMETRY_TRANSPORT,
    endpoint: e.SEARCH_TELEMETRY_ENDPOINT,
    write_key: e.SEARCH_TELEMETRY_WRITE_KEY,
    redis_url: e.SEARCH_TELEMETRY_REDIS_URL,
    flush_interval_ms: e.SEARCH_TELEMETRY_FLUSH_INTERVAL_MS,
    server: {
      env: e.SEARCH_ENV,
      db_path: e.SEARCH_DB_PATH,
      http_addr: e.SEARCH_HTTP_ADDR,
      config_file_path: e.SEARCH_CONFIG_FILE_PATH,
      import_dump: e.SEARCH_IMPORT_DUMP,
      ignore_missing_dump: e.SEARCH_IGNORE_MISSING_DUMP,
      ignore_dump_if_db_exists: e.SEARCH_IGNORE_DUMP_IF_DB_EXISTS,
      dump_dir: e.SEARCH_DUMP_DIR,
      import_snapshot: e.SEARCH_IMPORT_SNAPSHOT,
      ignore_missing_snapshot: e.SEARCH_IGNORE_MISSING_SNAPSHOT,
      ignore_snapshot_if_db_exists: e.SEARCH_IGNORE_SNAPSHOT_IF_DB_EXISTS,
      snapshot_dir: e.SEARCH_SNAPSHOT_DIR,
      schedule_snapshot: e.SEARCH_SCHEDULE_SNAPSHOT,
      task_webhook_url: e.SEARCH_TASK_WEBHOOK_URL,
      task_webhook_authorization_header: e.SEARCH_TASK_WEBHOOK_AUTHORIZATION_HEADER,
      ssl_auth_path: e.SEARCH_SSL_AUTH_PATH,
      ssl_cert_path: e.SEARCH_SSL_CERT_PATH,
      ssl_key_path: e.SEARCH_SSL_KEY_PATH,
      ssl_ocsp_path: e.SEARCH_SSL_OCSP_PATH,
      ssl_require_auth: e.SEARCH_SSL_REQUIRE_AUTH,
      ssl_resumption: e.SEARCH_SSL_RESUMPTION,
      ssl_tickets: e.SEARCH_SSL_TICKETS,
      log_level: e.LOG_LEVEL,
      max_indexing_memory: e.SEARCH_MAX_INDEXING_MEMORY,
      max_indexing_threads: e.SEARCH_MAX_INDEXING_THREADS,
      http_payload_size_limit: e.SEARCH_HTTP_PAYLOAD_SIZE_LIMIT,
      experimental_enable_metrics: e.SEARCH_EXPERIMENTAL_ENABLE_METRICS,
      experimental_enable_logs_route: e.SEARCH_EXPERIMENTAL_ENABLE_LOGS_ROUTE,
      experimental_contains_filter: e.SEARCH_EXPERIMENTAL_CONTAINS_FILTER,
      experimental_search_queue_size: e.SEARCH_EXPERIMENTAL_SEARCH_QUEUE_SIZE,
      experimental_drop_search_after: e.SEARCH_EXPERIMENTAL_DROP_SEARCH_AFTER,
      experimental_nb_searches_per_core: e.SEARCH_EXPERIMENTAL_NB_SEARCHES_PER_CORE,
      experimental_logs_mode: e.SEARCH_EXPERIMENTAL_LOGS_MODE,
      experimental_replication_parameters: e.SEARCH_EXPERIMENTAL_REPLICATION_PARAMETERS,
      experimental_reduce_indexing_memory_usage: e.SEARCH_EXPERIMENTAL_REDUCE_INDEXING_MEMORY_USAGE,
      experimental_max_number_of_batched_tasks: e.SEARCH_EXPERIMENTAL_MAX_NUMBER_OF_BATCHED_TASKS,
      gpu_enabled: e.SEARCH_GPU_ENABLED,
    },
  };
}
