import path from 'path';

import { megacmdLog } from '../logger';
import { formatCommandError } from './errors';

export const SERVER_STARTUP_DELAY_MS = 2000;
export const VERSION_CHECK_TIMEOUT_MS = 5000;
export const READINESS_TIMEOUT_MS = 15000;
export const READINESS_RETRY_DELAY_MS = 1000;

export const LINUX_SERVER_BINARY = 'mega-cmd-server';
export const MACOS_APP_BINARY = 'MEGAcmd';

export interface ServerReadinessDependencies {
  inContainer: boolean;
  spawnsProcesses: boolean;
  platform: NodeJS.Platform;
  megacmdPath: string | null;
  searchPath: string;
  findExecutable: (name: string, searchPath: string) => Promise<string | null>;
  startServer: (command: string) => void;
  checkVersion: (timeoutMs: number) => Promise<boolean>;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Finds the background server executable. On macOS the bundle ships the
 * `MEGAcmd` app instead of a headless server; it is reported but never started.
 */
export async function resolveServerBinary(
  dependencies: Pick<ServerReadinessDependencies, 'platform' | 'megacmdPath' | 'searchPath' | 'findExecutable'>
): Promise<string | null> {
  if (!dependencies.searchPath) {
    return null;
  }

  if (await dependencies.findExecutable(LINUX_SERVER_BINARY, dependencies.searchPath)) {
    return LINUX_SERVER_BINARY;
  }

  if (dependencies.platform === 'darwin' && dependencies.megacmdPath) {
    const appBinary = path.join(dependencies.megacmdPath, MACOS_APP_BINARY);
    if (await dependencies.findExecutable(appBinary, dependencies.searchPath)) {
      return appBinary;
    }
  }

  return null;
}

export async function waitForServerReady(
  dependencies: Pick<ServerReadinessDependencies, 'checkVersion' | 'sleep' | 'now'>,
  maxWaitMs: number = READINESS_TIMEOUT_MS
): Promise<boolean> {
  const deadline = dependencies.now() + maxWaitMs;

  while (dependencies.now() < deadline) {
    try {
      if (await dependencies.checkVersion(VERSION_CHECK_TIMEOUT_MS)) {
        return true;
      }
    } catch (error) {
      megacmdLog.debug(`version check failed: ${formatCommandError(error)}`);
    }

    await dependencies.sleep(READINESS_RETRY_DELAY_MS);
  }

  return false;
}

export async function ensureMegaCmdServer(dependencies: ServerReadinessDependencies): Promise<boolean> {
  if (dependencies.inContainer || !dependencies.spawnsProcesses) {
    return true;
  }

  const serverBinary = await resolveServerBinary(dependencies);

  if (serverBinary === LINUX_SERVER_BINARY) {
    dependencies.startServer(serverBinary);
    megacmdLog.debug('started mega-cmd-server, waiting for it to accept commands');
    await dependencies.sleep(SERVER_STARTUP_DELAY_MS);
  }

  const ready = await waitForServerReady(dependencies);
  megacmdLog.debug('server ready check', { ready, serverBinary });
  return ready;
}
