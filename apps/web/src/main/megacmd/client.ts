import type { ProcessInvocationResult, TransferAction } from '../../shared/types';
import { megacmdLog } from '../logger';
import type { CommandRunner } from './command-runner';
import { formatCommandError, redactMegaLinkKeys } from './errors';

export const RESUME_AFTER_START_DELAY_MS = 2000;

const ACTION_FLAGS: Record<TransferAction, string> = {
  cancel: '-c',
  pause: '-p',
  resume: '-r'
};

export interface MegaCmdClientOptions {
  runner: CommandRunner;
  downloadDir: string;
  transferListLimit: number;
  pathDisplaySize: number;
  resumeDelayMs?: number;
}

export class MegaCmdClient {
  private readonly runner: CommandRunner;
  private readonly downloadDir: string;
  private readonly transferListLimit: number;
  private readonly pathDisplaySize: number;
  private readonly resumeDelayMs: number;
  private readonly followUpTimers = new Set<NodeJS.Timeout>();

  constructor(options: MegaCmdClientOptions) {
    this.runner = options.runner;
    this.downloadDir = options.downloadDir;
    this.transferListLimit = options.transferListLimit;
    this.pathDisplaySize = options.pathDisplaySize;
    this.resumeDelayMs = options.resumeDelayMs ?? RESUME_AFTER_START_DELAY_MS;
  }

  get spawnsProcesses(): boolean {
    return this.runner.spawnsProcesses;
  }

  async startTransfer(url: string): Promise<ProcessInvocationResult> {
    const result = await this.runner.run('mega-get', ['-q', '--ignore-quota-warn', url.trim(), this.downloadDir]);

    megacmdLog.debug('mega-get finished', {
      url: redactMegaLinkKeys(url.trim()),
      exitCode: result.exitCode,
      stderr: result.stderr.slice(0, 400).trim()
    });

    if (result.exitCode === 0) {
      this.scheduleResumeAll();
    }

    return result;
  }

  controlTransfer(action: TransferAction, tag: string | null): Promise<ProcessInvocationResult> {
    return this.runner.run('mega-transfers', [ACTION_FLAGS[action], tag ? tag.trim() : '-a']);
  }

  async listTransfers(): Promise<string> {
    const result = await this.runner.run('mega-transfers', [
      `--limit=${this.transferListLimit}`,
      `--path-display-size=${this.pathDisplaySize}`
    ]);

    let output = result.stdout;
    if (result.stderr && result.exitCode !== 0) {
      output += result.stderr;
    }

    megacmdLog.debug('mega-transfers output', { exitCode: result.exitCode, output });
    return output;
  }

  async checkVersion(timeoutMs: number): Promise<boolean> {
    const result = await this.runner.run('mega-version', [], { timeoutMs });
    return result.exitCode === 0;
  }

  dispose(): void {
    for (const timer of this.followUpTimers) {
      clearTimeout(timer);
    }
    this.followUpTimers.clear();
  }

  // Newly queued transfers can sit at 0% until something nudges the queue.
  private scheduleResumeAll(): void {
    const timer = setTimeout(() => {
      this.followUpTimers.delete(timer);
      this.controlTransfer('resume', null).catch((error: unknown) => {
        megacmdLog.debug(`resume-all follow-up failed: ${formatCommandError(error)}`);
      });
    }, this.resumeDelayMs);

    this.followUpTimers.add(timer);
  }
}
