export class CommandTimeoutError extends Error {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

const MAX_MESSAGE_LENGTH = 220;

export function redactMegaLinkKeys(message: unknown): string {
  if (typeof message !== 'string' || !message) {
    return '';
  }

  return message.replace(/(https?:\/\/(?:www\.)?mega\.(?:nz|co\.nz|io)\/[^\s#]*#)\S+/gi, '$1[redacted]');
}

function readErrorField(error: unknown, field: 'message' | 'code' | 'path'): string {
  if (!error || typeof error !== 'object' || !(field in error)) {
    return '';
  }

  const value: unknown = Reflect.get(error, field);
  return value === undefined || value === null ? '' : String(value);
}

function mapKnownCommandError(error: unknown): string | null {
  if (error instanceof CommandTimeoutError) {
    return `Command timed out after ${Math.round(error.timeoutMs / 1000)}s: ${error.command}`;
  }

  const code = readErrorField(error, 'code');
  const command = readErrorField(error, 'path') || 'unknown command';

  if (code === 'ENOENT') {
    return `MEGAcmd command not found: ${command}. Install MEGAcmd or set MEGACMD_PATH.`;
  }

  if (code === 'EACCES') {
    return `Permission denied running ${command}. Check MEGACMD_PATH permissions.`;
  }

  return null;
}

export function formatCommandError(error: unknown): string {
  const knownMessage = mapKnownCommandError(error);
  if (knownMessage) {
    return knownMessage;
  }

  const rawMessage = error instanceof Error || typeof error === 'object'
    ? readErrorField(error, 'message')
    : String(error ?? '');

  const sanitized = redactMegaLinkKeys(rawMessage).replace(/\s+/g, ' ').trim();
  if (!sanitized) {
    return 'Command failed.';
  }

  return sanitized.length > MAX_MESSAGE_LENGTH
    ? `${sanitized.slice(0, MAX_MESSAGE_LENGTH - 3)}...`
    : sanitized;
}
