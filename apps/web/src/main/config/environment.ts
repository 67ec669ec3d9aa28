import fs from 'fs';
import os from 'os';
import path from 'path';

import * as dotenv from 'dotenv';
import { z } from 'zod';

import type { RunMode } from '../../shared/types';

export const MIN_POLL_INTERVAL_MS = 500;
export const DEFAULT_SERVER_PORT = 8080;
export const HISTORY_FILENAME = '.mega-get-history.json';
export const MACOS_MEGACMD_PATH = '/Applications/MEGAcmd.app/Contents/MacOS';
export const CONTAINER_DOWNLOAD_DIR = '/data/';

const TRUTHY_VALUES = new Set(['1', 'true', 'yes']);

const Flag = z
  .string()
  .optional()
  .transform((value) => TRUTHY_VALUES.has((value ?? '').trim().toLowerCase()));

const OptionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || null);

function positiveInt(fallback: number) {
  return z.coerce.number().int().positive().catch(fallback);
}

const EnvironmentSchema = z.object({
  DOWNLOAD_DIR: OptionalText,
  TRANSFER_LIST_LIMIT: positiveInt(50),
  PATH_DISPLAY_SIZE: positiveInt(80),
  INPUT_TIMEOUT: z.coerce.number().nonnegative().catch(0.0166),
  MEGA_SIMULATE: Flag,
  UI_TEST_MODE: Flag,
  MEGACMD_PATH: OptionalText,
  WEB_SERVER: Flag,
  SERVER_PORT: z.coerce.number().int().min(1).max(65535).catch(DEFAULT_SERVER_PORT),
  HISTORY_FILE: OptionalText,
  DEBUG_LOG_PATH: OptionalText,
  DISPLAY: OptionalText,
  USERPROFILE: OptionalText,
  container: OptionalText
});

export type EnvironmentVariables = z.infer<typeof EnvironmentSchema>;

export interface EnvironmentProbes {
  platform: NodeJS.Platform;
  cwd: () => string;
  homedir: () => string;
  pathExists: (targetPath: string) => boolean;
  isDirectory: (targetPath: string) => boolean;
}

export interface AppConfig {
  runMode: RunMode;
  inContainer: boolean;
  platform: NodeJS.Platform;
  downloadDir: string;
  transferListLimit: number;
  pathDisplaySize: number;
  pollIntervalMs: number;
  simulate: boolean;
  sampleData: boolean;
  megacmdPath: string | null;
  server: {
    host: string;
    port: number;
  };
  historyFile: string;
  debugLogPath: string | null;
}

export const systemProbes: EnvironmentProbes = {
  platform: process.platform,
  cwd: () => process.cwd(),
  homedir: () => os.homedir(),
  pathExists: (targetPath) => fs.existsSync(targetPath),
  isDirectory: (targetPath) => {
    try {
      return fs.statSync(targetPath).isDirectory();
    } catch {
      return false;
    }
  }
};

/**
 * Loads `.env` from the working directory. Variables already present in the
 * process environment keep their values.
 */
export function loadEnvironmentFile(cwd: string = process.cwd()): boolean {
  const result = dotenv.config({ path: path.join(cwd, '.env') });
  return !result.error;
}

export function resolvePollIntervalMs(intervalSeconds: number): number {
  const intervalMs = Number.isFinite(intervalSeconds) ? Math.round(intervalSeconds * 1000) : 0;
  return Math.max(intervalMs, MIN_POLL_INTERVAL_MS);
}

export function isContainerRun(variables: EnvironmentVariables, probes: EnvironmentProbes): boolean {
  return probes.pathExists('/.dockerenv') || Boolean(variables.container);
}

export function resolveDefaultDownloadDir(
  inContainer: boolean,
  variables: EnvironmentVariables,
  probes: EnvironmentProbes
): string {
  if (inContainer) {
    return CONTAINER_DOWNLOAD_DIR;
  }

  if (probes.platform === 'win32') {
    return path.win32.join(variables.USERPROFILE || '', 'Downloads');
  }

  return path.join(probes.homedir(), 'Downloads');
}

export function resolveMegaCmdPath(variables: EnvironmentVariables, probes: EnvironmentProbes): string | null {
  if (variables.MEGACMD_PATH) {
    return variables.MEGACMD_PATH;
  }

  if (probes.platform === 'darwin' && probes.isDirectory(MACOS_MEGACMD_PATH)) {
    return MACOS_MEGACMD_PATH;
  }

  return null;
}

export function resolveRunMode(
  inContainer: boolean,
  variables: EnvironmentVariables,
  probes: EnvironmentProbes
): RunMode {
  if (inContainer) {
    return 'container';
  }

  if (variables.WEB_SERVER || (probes.platform === 'linux' && !variables.DISPLAY)) {
    return 'web';
  }

  return 'desktop';
}

export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  probes: EnvironmentProbes = systemProbes
): AppConfig {
  const variables = EnvironmentSchema.parse(env);
  const inContainer = isContainerRun(variables, probes);
  const runMode = resolveRunMode(inContainer, variables, probes);
  const cwd = probes.cwd();

  return {
    runMode,
    inContainer,
    platform: probes.platform,
    downloadDir: variables.DOWNLOAD_DIR || resolveDefaultDownloadDir(inContainer, variables, probes),
    transferListLimit: variables.TRANSFER_LIST_LIMIT,
    pathDisplaySize: variables.PATH_DISPLAY_SIZE,
    pollIntervalMs: resolvePollIntervalMs(variables.INPUT_TIMEOUT),
    simulate: variables.MEGA_SIMULATE,
    sampleData: variables.UI_TEST_MODE,
    megacmdPath: resolveMegaCmdPath(variables, probes),
    server: {
      host: runMode === 'desktop' ? '127.0.0.1' : '0.0.0.0',
      port: variables.SERVER_PORT
    },
    historyFile: variables.HISTORY_FILE
      ? path.resolve(cwd, variables.HISTORY_FILE)
      : path.join(cwd, HISTORY_FILENAME),
    debugLogPath: variables.DEBUG_LOG_PATH ? path.resolve(cwd, variables.DEBUG_LOG_PATH) : null
  };
}
