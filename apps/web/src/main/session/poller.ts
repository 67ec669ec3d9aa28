import type { TransferRecord } from '../../shared/types';
import { MIN_POLL_INTERVAL_MS } from '../config/environment';
import { pollLog } from '../logger';
import { formatCommandError } from '../megacmd/errors';
import { parseTransferList } from '../megacmd/transfer-parser';
import type { SessionState } from './session-state';

export const RETRYING_STATE = 'RETRYING';
export const RETRYING_ADVISORY = '⚠ If transfers stay at 0% (RETRYING), try Resume, or Cancel and re-add the URL.';

export interface TransferPollerOptions {
  listTransfers: () => Promise<string>;
  state: SessionState;
  intervalMs: number;
  parse?: (raw: string) => TransferRecord[];
}

export class TransferPoller {
  readonly intervalMs: number;
  private readonly listTransfers: () => Promise<string>;
  private readonly state: SessionState;
  private readonly parse: (raw: string) => TransferRecord[];
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private pollCount = 0;

  constructor(options: TransferPollerOptions) {
    this.listTransfers = options.listTransfers;
    this.state = options.state;
    this.parse = options.parse || parseTransferList;
    this.intervalMs = Math.max(options.intervalMs, MIN_POLL_INTERVAL_MS);
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.inFlight = this.tick();
  }

  async stop(): Promise<void> {
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  async pollOnce(): Promise<void> {
    try {
      const raw = await this.listTransfers();
      const records = this.parse(raw);

      this.state.replaceListing(raw, records);

      if (records.some((record) => record.state === RETRYING_STATE) && this.state.claimRetryingAdvisory()) {
        this.state.appendMessage(RETRYING_ADVISORY);
      }

      this.pollCount += 1;
      if (this.pollCount <= 5 || this.pollCount % 10 === 0) {
        pollLog.debug('poll cycle complete', { pollCount: this.pollCount, transfers: records.length });
      }
    } catch (error) {
      const message = formatCommandError(error);
      pollLog.warn(`poll failed: ${message}`);
      this.state.appendMessage(`Poll error: ${message}`);
    }
  }

  private async tick(): Promise<void> {
    await this.pollOnce();

    if (!this.running) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick();
    }, this.intervalMs);
  }
}
