import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';

const INSTANCE_UID_FILE = 'instance-uid';
const APP_CONFIG_DIR = 'search-telemetry';

const uidSchema = z.string().trim().uuid();

export interface IdentityOptions {
  /** Base user-config directory. Defaults to `$XDG_CONFIG_HOME` or `~/.config`. */
  configDir?: string;
  log?: Logger;
}

function userConfigDir(opts: IdentityOptions): string {
  const base = opts.configDir ?? process.env['XDG_CONFIG_HOME'] ?? join(homedir(), '.config');
  return join(base, APP_CONFIG_DIR);
}

/**
 * Per-database file under the user config directory.
 *
 * `/var/lib/search/data.ms` → `<config>/search-telemetry/var-lib-search-data.ms-instance-uid`
 */
export function configUidPath(dbPath: string, opts: IdentityOptions = {}): string {
  const sanitized = resolve(dbPath).replace(/[\\/:]+/g, '-').replace(/^-+/, '');
  return join(userConfigDir(opts), `${sanitized}-${INSTANCE_UID_FILE}`);
}

async function readUid(path: string, log: Logger | undefined): Promise<string | null> {
  try {
    const parsed = uidSchema.safeParse(await readFile(path, 'utf-8'));
    return parsed.success ? parsed.data : null;
  } catch (err: unknown) {
    log?.debug({ err, path }, 'Instance uid not readable');
    return null;
  }
}

/**
 * Looks for a persisted instance uid: first inside the database directory,
 * then in the user config directory. Only valid UUIDs are accepted.
 */
export async function findInstanceUid(
  dbPath: string,
  opts: IdentityOptions = {},
): Promise<string | null> {
  return (
    (await readUid(join(dbPath, INSTANCE_UID_FILE), opts.log))
    ?? (await readUid(configUidPath(dbPath, opts), opts.log))
  );
}

/**
 * Writes the uid to both locations. The database directory is expected to
 * exist already; only the user config directory is created. Failures are
 * logged and ignored.
 */
export async function writeInstanceUid(
  dbPath: string,
  uid: string,
  opts: IdentityOptions = {},
): Promise<void> {
  const dbCopy = join(dbPath, INSTANCE_UID_FILE);
  try {
    await writeFile(dbCopy, uid, 'utf-8');
  } catch (err: unknown) {
    opts.log?.debug({ err, path: dbCopy }, 'Instance uid not written');
  }

  const configCopy = configUidPath(dbPath, opts);
  try {
    await mkdir(dirname(configCopy), { recursive: true });
    await writeFile(configCopy, uid, 'utf-8');
  } catch (err: unknown) {
    opts.log?.debug({ err, path: configCopy }, 'Instance uid not written');
  }
}
