export type KnownTransferState = 'ACTIVE' | 'PAUSED' | 'QUEUED' | 'RETRYING' | 'COMPLETED' | 'FAILED';

// Unrecognized states from MEGAcmd are passed through verbatim.
export type TransferState = KnownTransferState | (string & {});

export type TransferDirection = 'download' | 'upload';

export type TransferAction = 'cancel' | 'pause' | 'resume';

export interface TransferRecord {
  tag: string;
  state: TransferState;
  progressPercent: number;
  path: string;
  filename: string;
  sizeDisplay: string;
  direction: TransferDirection | null;
}

export interface ProcessInvocationResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type ListingStatus = 'pending' | 'empty' | 'unparsed' | 'ready';

export interface TransferListing {
  raw: string;
  records: TransferRecord[];
  updatedAt: number | null;
}

export interface SessionSnapshot {
  messages: string[];
  listing: TransferListing;
  listingStatus: ListingStatus;
}

export type RunMode = 'desktop' | 'web' | 'container';

export interface SubmitUrlResult {
  accepted: boolean;
  started: boolean;
}

export interface ControlTransferResult {
  accepted: boolean;
  exitCode: number | null;
}
