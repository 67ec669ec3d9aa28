import type {
  ControlTransferResult,
  ProcessInvocationResult,
  SubmitUrlResult,
  TransferAction
} from '../../shared/types';
import { historyLog, megacmdLog } from '../logger';
import { formatCommandError } from '../megacmd/errors';
import type { UrlHistoryStore } from '../history/url-history';
import type { SessionState } from './session-state';

const MAX_TAG_LENGTH = 64;
const TRANSFER_ACTIONS: readonly TransferAction[] = ['cancel', 'pause', 'resume'];

export interface TransferCommands {
  startTransfer: (url: string) => Promise<ProcessInvocationResult>;
  controlTransfer: (action: TransferAction, tag: string | null) => Promise<ProcessInvocationResult>;
}

export interface TransferActionsOptions {
  commands: TransferCommands;
  state: SessionState;
  history: Pick<UrlHistoryStore, 'add' | 'clear' | 'list'>;
  downloadDir: string;
  /** Set when no MEGAcmd process runs; requests are acknowledged without calling `commands`. */
  simulated?: boolean;
}

export function isTransferAction(value: unknown): value is TransferAction {
  return typeof value === 'string' && TRANSFER_ACTIONS.some((action) => action === value);
}

/**
 * Tags are opaque, but they end up as a command-line argument, so anything
 * that could read as a flag or split into two arguments is refused.
 */
export function isValidTransferTag(value: string): boolean {
  return value.length > 0
    && value.length <= MAX_TAG_LENGTH
    && !value.startsWith('-')
    && !/\s/.test(value);
}

function titleCase(action: TransferAction): string {
  return `${action.charAt(0).toUpperCase()}${action.slice(1)}`;
}

export class TransferActions {
  private readonly commands: TransferCommands;
  private readonly state: SessionState;
  private readonly history: Pick<UrlHistoryStore, 'add' | 'clear' | 'list'>;
  private readonly downloadDir: string;
  private readonly simulated: boolean;

  constructor(options: TransferActionsOptions) {
    this.commands = options.commands;
    this.state = options.state;
    this.history = options.history;
    this.downloadDir = options.downloadDir;
    this.simulated = options.simulated ?? false;
  }

  listHistory(): string[] {
    return this.history.list();
  }

  async submitUrl(rawUrl: unknown): Promise<SubmitUrlResult> {
    const url = typeof rawUrl === 'string' ? rawUrl.trim() : '';
    if (!url) {
      this.state.appendMessage('⚠ Please enter a MEGA URL');
      return { accepted: false, started: false };
    }

    try {
      await this.history.add(url);
    } catch (error) {
      historyLog.warn(`could not save history: ${formatCommandError(error)}`);
    }

    if (this.simulated) {
      this.state.appendMessage('URL Accepted (simulated)');
      return { accepted: true, started: false };
    }

    this.state.appendMessage(`Starting download to ${this.downloadDir}...`);

    let result: ProcessInvocationResult;
    try {
      result = await this.commands.startTransfer(url);
    } catch (error) {
      megacmdLog.warn(`mega-get failed to launch: ${formatCommandError(error)}`);
      this.state.appendMessage(`✗ Error: ${formatCommandError(error)}`);
      return { accepted: true, started: false };
    }

    if (result.exitCode === 0) {
      this.state.appendMessage('✓ Download started successfully');
      return { accepted: true, started: true };
    }

    this.state.appendMessage('✗ Error: Unable to parse MEGA URL');
    const details = result.stderr.trim();
    if (details) {
      this.state.appendMessage(`Details: ${details}`);
    }

    return { accepted: true, started: false };
  }

  async controlTransfer(action: unknown, rawTag: string | null): Promise<ControlTransferResult> {
    const tag = rawTag === null ? null : rawTag.trim();

    if (!isTransferAction(action) || (tag !== null && !isValidTransferTag(tag))) {
      this.state.appendMessage('⚠ Unknown transfer action or tag');
      return { accepted: false, exitCode: null };
    }

    const target = tag ?? 'all';

    if (this.simulated) {
      this.state.appendMessage(`${titleCase(action)} transfer ${target}`);
      return { accepted: true, exitCode: 0 };
    }

    let result: ProcessInvocationResult;
    try {
      result = await this.commands.controlTransfer(action, tag);
    } catch (error) {
      this.state.appendMessage(`✗ Error: ${formatCommandError(error)}`);
      return { accepted: true, exitCode: null };
    }

    const output = result.stdout.trim();
    const errorOutput = result.stderr.trim();

    if (output) {
      this.state.appendMessage(output);
    }

    if (errorOutput && result.exitCode !== 0) {
      this.state.appendMessage(errorOutput);
    } else {
      this.state.appendMessage(`${titleCase(action)} command sent for transfer ${target}`);
    }

    return { accepted: true, exitCode: result.exitCode };
  }

  async clearHistory(): Promise<void> {
    await this.history.clear();
  }
}
