import log from 'electron-log/node';

export interface LoggerOptions {
  debugLogPath: string | null;
}

const isVitest = Boolean(process.env.VITEST);

log.transports.console.level = isVitest ? false : 'info';
log.transports.file.level = false;

export function configureLogger(options: LoggerOptions): void {
  if (isVitest || !options.debugLogPath) {
    log.transports.file.level = false;
    return;
  }

  const debugLogPath = options.debugLogPath;
  log.transports.file.resolvePathFn = () => debugLogPath;
  log.transports.file.level = 'debug';
}

export const pollLog = log.scope('poll');
export const megacmdLog = log.scope('megacmd');
export const serverLog = log.scope('server');
export const historyLog = log.scope('history');

export default log;
