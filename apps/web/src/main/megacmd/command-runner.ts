import { spawn } from 'child_process';
import fs from 'fs/promises';
import path from 'path';

import type { ProcessInvocationResult } from '../../shared/types';
import { megacmdLog } from '../logger';
import { CommandTimeoutError, formatCommandError } from './errors';

export interface RunCommandOptions {
  timeoutMs?: number;
}

export interface CommandRunner {
  readonly spawnsProcesses: boolean;
  run: (command: string, args: readonly string[], options?: RunCommandOptions) => Promise<ProcessInvocationResult>;
  spawnDetached: (command: string, args?: readonly string[]) => void;
}

export function buildSearchPath(megacmdPath: string | null, basePath: string | undefined): string {
  const segments = [megacmdPath, basePath].filter((segment): segment is string => Boolean(segment));
  return segments.join(path.delimiter);
}

export function buildCommandEnv(
  megacmdPath: string | null,
  baseEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  return {
    ...baseEnv,
    PATH: buildSearchPath(megacmdPath, baseEnv.PATH)
  };
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) {
      return false;
    }

    await fs.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function findExecutable(name: string, searchPath: string): Promise<string | null> {
  if (!name) {
    return null;
  }

  if (name.includes('/') || name.includes(path.sep)) {
    return (await isExecutableFile(name)) ? name : null;
  }

  for (const directory of searchPath.split(path.delimiter)) {
    if (!directory) {
      continue;
    }

    const candidate = path.join(directory, name);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

export class ProcessCommandRunner implements CommandRunner {
  readonly spawnsProcesses = true;
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv) {
    this.env = env;
  }

  run(command: string, args: readonly string[], options: RunCommandOptions = {}): Promise<ProcessInvocationResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        env: this.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | null = null;

      const settle = (callback: () => void) => {
        if (settled) {
          return;
        }

        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        callback();
      };

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        settle(() => reject(error));
      });

      child.on('close', (exitCode) => {
        settle(() => resolve({ exitCode, stdout, stderr }));
      });

      if (options.timeoutMs && options.timeoutMs > 0) {
        const timeoutMs = options.timeoutMs;
        timer = setTimeout(() => {
          child.kill('SIGKILL');
          settle(() => reject(new CommandTimeoutError(command, timeoutMs)));
        }, timeoutMs);
      }
    });
  }

  spawnDetached(command: string, args: readonly string[] = []): void {
    const child = spawn(command, args, {
      env: this.env,
      stdio: 'ignore',
      detached: true,
      windowsHide: true
    });

    child.on('error', (error) => {
      megacmdLog.warn(`Failed to start ${command}: ${formatCommandError(error)}`);
    });
    child.unref();
  }
}

export interface CannedResponses {
  listing: string;
}

export class CannedCommandRunner implements CommandRunner {
  readonly spawnsProcesses = false;
  private readonly responses: CannedResponses;

  constructor(responses: CannedResponses) {
    this.responses = responses;
  }

  async run(command: string, args: readonly string[]): Promise<ProcessInvocationResult> {
    const isListing = command === 'mega-transfers' && args.some((arg) => arg.startsWith('--limit'));
    return {
      exitCode: 0,
      stdout: isListing ? this.responses.listing : '',
      stderr: ''
    };
  }

  spawnDetached(): void {
    // nothing to start
  }
}
