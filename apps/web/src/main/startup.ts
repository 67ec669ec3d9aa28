import type { AppConfig } from './config/environment';
import { SAMPLE_NATIVE_LISTING, SIMULATED_LISTING } from './megacmd/canned-listings';
import { buildCommandEnv, CannedCommandRunner, ProcessCommandRunner, type CommandRunner } from './megacmd/command-runner';

type StartupConfig = Pick<AppConfig, 'simulate' | 'sampleData' | 'inContainer' | 'platform' | 'downloadDir'>;

export function createCommandRunner(
  config: Pick<AppConfig, 'simulate' | 'sampleData' | 'megacmdPath'>,
  baseEnv: NodeJS.ProcessEnv = process.env
): CommandRunner {
  if (config.sampleData) {
    return new CannedCommandRunner({ listing: SAMPLE_NATIVE_LISTING });
  }

  if (config.simulate) {
    return new CannedCommandRunner({ listing: SIMULATED_LISTING });
  }

  return new ProcessCommandRunner(buildCommandEnv(config.megacmdPath, baseEnv));
}

/** Lines shown before the readiness probe runs. */
export function getInitialNotices(config: StartupConfig): string[] {
  const notices: string[] = [];

  if (!config.simulate && !config.sampleData) {
    notices.push('⏳ Initializing MEGAcmd...');
  }

  if (config.sampleData) {
    notices.push('🧪 UI TEST MODE - Showing sample transfers for development');
    notices.push('ℹ Set UI_TEST_MODE=0 or remove env var to use real MEGAcmd');
  }

  return notices;
}

export function getReadinessNotices(config: StartupConfig, serverReady: boolean): string[] {
  const notices: string[] = [];

  if (!serverReady && !config.inContainer && config.platform === 'darwin' && !config.sampleData) {
    notices.push('⚠ MEGAcmd server not detected. Open MEGAcmd from Applications, then restart this app.');
  } else if (serverReady && !config.sampleData) {
    notices.push(`✓ MEGAcmd ready. Downloads will be saved to: ${config.downloadDir}`);
  }

  if (config.simulate) {
    notices.push('ℹ Simulation mode (MEGA_SIMULATE=1) - no MEGA CMD required.');
  }

  return notices;
}
