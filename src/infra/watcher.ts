import chokidar, { type FSWatcher } from 'chokidar';
import type { Logger } from 'pino';
import { readConfigFile } from '../core/config.js';
import { toBridgeError } from '../core/errors.js';
import type { SessionStore } from '../core/store.js';
import type { StatusSynchronizer } from '../core/synchronizer.js';
import type { BackendGateway } from './gateway.js';

export interface CredentialTarget {
  store: Pick<SessionStore, 'replaceCredential'>;
  gateway: Pick<BackendGateway, 'authenticate'>;
  synchronizer: Pick<StatusSynchronizer, 'wake'>;
}

/**
 * Pick up a token written to the config file by the setup wizard. Returns
 * true when the session credential was replaced.
 */
export async function applyConfigChange(filePath: string, target: CredentialTarget, log: Logger): Promise<boolean> {
  let token: string | undefined;
  try {
    token = readConfigFile(filePath).api_token;
  } catch (err) {
    log.warn({ err: toBridgeError(err).message, filePath }, 'config file unreadable; keeping current credential');
    return false;
  }
  if (!token) return false;
  if (!target.store.replaceCredential(token)) return false;

  try {
    const { account } = await target.gateway.authenticate();
    log.info({ email: account.email }, 'new credential verified');
  } catch (err) {
    const error = toBridgeError(err);
    log.warn({ code: error.code, reason: error.message }, 'new credential could not be verified');
  }
  target.synchronizer.wake();
  return true;
}

export function startConfigWatcher(filePath: string, target: CredentialTarget, log: Logger): FSWatcher {
  const watcher = chokidar.watch(filePath, {
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 150, pollInterval: 50 }
  });

  const onChange = (p: string) => {
    log.debug({ p }, 'config file changed');
    applyConfigChange(filePath, target, log).catch((err: unknown) => {
      log.error({ err }, 'failed to apply config change');
    });
  };

  watcher.on('add', onChange);
  watcher.on('change', onChange);

  watcher.on('error', (err) => {
    log.error({ err }, 'watcher error');
  });

  return watcher;
}
