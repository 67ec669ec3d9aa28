import type { ListingStatus, SessionSnapshot, TransferListing, TransferRecord } from '../../shared/types';

const DEFAULT_MAX_MESSAGES = 500;

/**
 * The one shared mutable object of a run.
 *
 * Holds the user-visible message log (FIFO, capped) and the latest transfer
 * listing. Readers take a copy through `snapshot()`.
 */
export class SessionState {
  private readonly messages: string[] = [];
  private listing: TransferListing = { raw: '', records: [], updatedAt: null };
  private retryingAdvisoryShown = false;
  private readonly maxMessages: number;

  constructor(maxMessages: number = DEFAULT_MAX_MESSAGES) {
    this.maxMessages = maxMessages;
  }

  appendMessage(line: string): void {
    this.messages.push(line);

    while (this.messages.length > this.maxMessages) {
      this.messages.shift();
    }
  }

  replaceListing(raw: string, records: TransferRecord[], updatedAt: number = Date.now()): void {
    this.listing = {
      raw,
      records: [...records],
      updatedAt
    };
  }

  /** Returns true only the first time it is called during the run. */
  claimRetryingAdvisory(): boolean {
    if (this.retryingAdvisoryShown) {
      return false;
    }

    this.retryingAdvisoryShown = true;
    return true;
  }

  getListingStatus(): ListingStatus {
    if (this.listing.updatedAt === null) {
      return 'pending';
    }

    if (this.listing.records.length > 0) {
      return 'ready';
    }

    return this.listing.raw.trim() ? 'unparsed' : 'empty';
  }

  snapshot(): SessionSnapshot {
    return {
      messages: [...this.messages],
      listing: {
        raw: this.listing.raw,
        records: this.listing.records.map((record) => ({ ...record })),
        updatedAt: this.listing.updatedAt
      },
      listingStatus: this.getListingStatus()
    };
  }
}
