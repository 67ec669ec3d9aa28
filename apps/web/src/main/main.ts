import fs from 'fs/promises';
import http from 'http';

import { resolveRefreshSeconds } from '../renderer/page';
import { createWebRequestHandler, DEFAULT_MAX_BODY_BYTES } from './bridge/server';
import { loadEnvironmentFile, resolveConfig } from './config/environment';
import { UrlHistoryStore } from './history/url-history';
import log, { configureLogger, serverLog } from './logger';
import { MegaCmdClient } from './megacmd/client';
import { buildSearchPath, findExecutable } from './megacmd/command-runner';
import { formatCommandError } from './megacmd/errors';
import { ensureMegaCmdServer, sleep } from './megacmd/server-readiness';
import { TransferActions } from './session/actions';
import { TransferPoller } from './session/poller';
import { SessionState } from './session/session-state';
import { createCommandRunner, getInitialNotices, getReadinessNotices } from './startup';
import { APP_VERSION } from './version';

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
    server.closeAllConnections();
  });
}

async function main(): Promise<void> {
  loadEnvironmentFile();
  const config = resolveConfig();
  configureLogger({ debugLogPath: config.debugLogPath });

  const runner = createCommandRunner(config);
  const client = new MegaCmdClient({
    runner,
    downloadDir: config.downloadDir,
    transferListLimit: config.transferListLimit,
    pathDisplaySize: config.pathDisplaySize
  });
  const state = new SessionState();
  const history = new UrlHistoryStore(config.historyFile);
  await history.load();

  const actions = new TransferActions({
    commands: client,
    state,
    history,
    downloadDir: config.downloadDir,
    simulated: !client.spawnsProcesses
  });

  for (const notice of getInitialNotices(config)) {
    state.appendMessage(notice);
  }

  let serverReady = false;
  const handler = createWebRequestHandler({
    host: config.server.host,
    port: config.server.port,
    maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
    refreshSeconds: resolveRefreshSeconds(config.pollIntervalMs),
    downloadDir: config.downloadDir,
    runMode: config.runMode,
    getAppVersion: () => APP_VERSION,
    isServerReady: () => serverReady,
    getSnapshot: () => state.snapshot(),
    actions
  });

  const server = http.createServer((request, response) => {
    handler(request, response).catch((error: unknown) => {
      serverLog.error(`${request.method ?? 'GET'} ${request.url ?? '/'} failed: ${formatCommandError(error)}`);
      if (!response.headersSent) {
        response.statusCode = 500;
      }
      response.end();
    });
  });
  await listen(server, config.server.host, config.server.port);
  serverLog.info(`MEGA Get ${APP_VERSION} (${config.runMode}) listening on http://${config.server.host}:${config.server.port}`);

  serverReady = await ensureMegaCmdServer({
    inContainer: config.inContainer,
    spawnsProcesses: client.spawnsProcesses,
    platform: config.platform,
    megacmdPath: config.megacmdPath,
    searchPath: buildSearchPath(config.megacmdPath, process.env.PATH),
    findExecutable,
    startServer: (command) => runner.spawnDetached(command),
    checkVersion: (timeoutMs) => client.checkVersion(timeoutMs),
    sleep,
    now: () => Date.now()
  });

  try {
    await fs.mkdir(config.downloadDir, { recursive: true });
  } catch (error) {
    log.warn(`could not create ${config.downloadDir}: ${formatCommandError(error)}`);
  }

  for (const notice of getReadinessNotices(config, serverReady)) {
    state.appendMessage(notice);
  }

  const poller = new TransferPoller({
    listTransfers: () => client.listTransfers(),
    state,
    intervalMs: config.pollIntervalMs
  });
  poller.start();

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    serverLog.info(`${signal} received, shutting down`);

    await poller.stop();
    client.dispose();
    await closeServer(server);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error(`shutdown failed: ${formatCommandError(error)}`);
        process.exitCode = 1;
      });
    });
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.error(`startup failed: ${formatCommandError(error)}`);
    process.exitCode = 1;
  });
}
