import type { RuntimeFeatures } from '../../domain/index.js';
import { DEFAULT_ANALYTICS_CONFIG } from '../config/index.js';
import type { LogMode, ServerOptions } from '../config/index.js';

export interface Infos {
  env: ServerOptions['env'];
  experimental_contains_filter: boolean;
  experimental_vector_store: boolean;
  experimental_enable_metrics: boolean;
  experimental_edit_documents_by_function: boolean;
  experimental_enable_logs_route: boolean;
  experimental_search_queue_size: number;
  experimental_drop_search_after: number;
  experimental_nb_searches_per_core: number;
  experimental_logs_mode: LogMode;
  experimental_replication_parameters: boolean;
  experimental_reduce_indexing_memory_usage: boolean;
  experimental_max_number_of_batched_tasks: number;
  gpu_enabled: boolean;
  db_path: boolean;
  import_dump: boolean;
  dump_dir: boolean;
  ignore_missing_dump: boolean;
  ignore_dump_if_db_exists: boolean;
  import_snapshot: boolean;
  schedule_snapshot: number | null;
  snapshot_dir: boolean;
  ignore_missing_snapshot: boolean;
  ignore_snapshot_if_db_exists: boolean;
  http_addr: boolean;
  http_payload_size_limit: number;
  task_queue_webhook: boolean;
  task_webhook_authorization_header: boolean;
  log_level: string;
  max_indexing_memory: number | null;
  max_indexing_threads: number | null;
  with_configuration_file: boolean;
  ssl_auth_path: boolean;
  ssl_cert_path: boolean;
  ssl_key_path: boolean;
  ssl_ocsp_path: boolean;
  ssl_require_auth: boolean;
  ssl_resumption: boolean;
  ssl_tickets: boolean;
}

/**
 * Server configuration as reported in the snapshot.
 *
 * Anything that holds a path, an address or a key is reduced to whether
 * it was customised. Experimental flags are OR'ed with their runtime
 * toggle.
 */
export function computeInfos(server: ServerOptions, features: RuntimeFeatures): Infos {
  const defaults = DEFAULT_ANALYTICS_CONFIG.server;

  return {
    env: server.env,
    experimental_contains_filter: server.experimental_contains_filter || features.contains_filter,
    experimental_vector_store: features.vector_store,
    experimental_enable_metrics: server.experimental_enable_metrics || features.metrics,
    experimental_edit_documents_by_function: features.edit_documents_by_function,
    experimental_enable_logs_route: server.experimental_enable_logs_route || features.logs_route,
    experimental_search_queue_size: server.experimental_search_queue_size,
    experimental_drop_search_after: server.experimental_drop_search_after,
    experimental_nb_searches_per_core: server.experimental_nb_searches_per_core,
    experimental_logs_mode: server.experimental_logs_mode,
    experimental_replication_parameters: server.experimental_replication_parameters,
    experimental_reduce_indexing_memory_usage: server.experimental_reduce_indexing_memory_usage,
    experimental_max_number_of_batched_tasks: server.experimental_max_number_of_batched_tasks,
    gpu_enabled: server.gpu_enabled,
    db_path: server.db_path !== defaults.db_path,
    import_dump: server.import_dump !== null,
    dump_dir: server.dump_dir !== null,
    ignore_missing_dump: server.ignore_missing_dump,
    ignore_dump_if_db_exists: server.ignore_dump_if_db_exists,
    import_snapshot: server.import_snapshot !== null,
    schedule_snapshot: server.schedule_snapshot,
    snapshot_dir: server.snapshot_dir !== null,
    ignore_missing_snapshot: server.ignore_missing_snapshot,
    ignore_snapshot_if_db_exists: server.ignore_snapshot_if_db_exists,
    http_addr: server.http_addr !== defaults.http_addr,
    http_payload_size_limit: server.http_payload_size_limit,
    task_queue_webhook: server.task_webhook_url !== null,
    task_webhook_authorization_header: server.task_webhook_authorization_header !== null,
    log_level: server.log_level,
    max_indexing_memory: server.max_indexing_memory,
    max_indexing_threads: server.max_indexing_threads,
    with_configuration_file: server.config_file_path !== null,
    ssl_auth_path: server.ssl_auth_path !== null,
    ssl_cert_path: server.ssl_cert_path !== null,
    ssl_key_path: server.ssl_key_path !== null,
    ssl_ocsp_path: server.ssl_ocsp_path !== null,
    ssl_require_auth: server.ssl_require_auth,
    ssl_resumption: server.ssl_resumption,
    ssl_tickets: server.ssl_tickets,
  };
}
