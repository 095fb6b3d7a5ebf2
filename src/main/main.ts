import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import type { DockPanelConfig } from '@shared/contracts';
import { ControlRouter } from '@main/services/commands/ControlRouter';
import { ConfigStore } from '@main/services/config/ConfigStore';
import { ConsoleDisplaySurface } from '@main/services/display/ConsoleDisplaySurface';
import { Logger, parseLogLevel } from '@main/services/logging/Logger';
import { ConnectivityProbe } from '@main/services/network/ConnectivityProbe';
import { TimerScheduler } from '@main/services/runtime/Scheduler';
import { NodeCommandRunner } from '@main/services/system/CommandRunner';
import { BatteryStatsReader } from '@main/services/telemetry/BatteryStatsReader';
import { TelemetryIngestor } from '@main/services/telemetry/TelemetryIngestor';
import { CredentialLoader } from '@main/services/update/CredentialLoader';
import { ReleaseClient } from '@main/services/update/ReleaseClient';
import { UpdateInstaller } from '@main/services/update/UpdateInstaller';
import { UpdateOrchestrator } from '@main/services/update/UpdateOrchestrator';
import { UpdatePolicyStore } from '@main/services/update/UpdatePolicyStore';
import { UpdateStateStore } from '@main/services/update/UpdateStateStore';

async function bootstrap(): Promise<void> {
  const baseDir = process.env.DOCKPANEL_HOME?.trim() || path.join(os.homedir(), '.dockpanel');
  const logger = new Logger(baseDir, {
    mirrorFilePath: process.env.DOCKPANEL_DEBUG_LOG_MIRROR,
    minLevel: parseLogLevel(process.env.DOCKPANEL_LOG_LEVEL) ?? 'info',
    console: readBooleanFlag('DOCKPANEL_LOG_CONSOLE') ? process.stderr : null
  });

  const configStore = new ConfigStore(baseDir);
  const config = applyEnvOverrides(configStore.get());

  const display = new ConsoleDisplaySurface(process.stdout, {
    showModules: readBooleanFlag('DOCKPANEL_SHOW_MODULES')
  });
  const runner = new NodeCommandRunner();
  const scheduler = new TimerScheduler(logger);

  const probe = new ConnectivityProbe({
    runner,
    logger,
    wirelessInterface: config.connectivity.wirelessInterface,
    commandTimeoutMs: config.connectivity.commandTimeoutMs
  });
  const orchestrator = new UpdateOrchestrator({
    stateStore: new UpdateStateStore(),
    policyStore: new UpdatePolicyStore(baseDir),
    probe,
    credentials: new CredentialLoader({ filePath: configStore.resolvePath(config.tokenFilePath), logger }),
    releaseClient: new ReleaseClient({ ...config.release, logger }),
    installer: new UpdateInstaller({
      ...config.installer,
      cwd: baseDir,
      runner,
      logger
    }),
    display,
    logger,
    currentVersion: config.currentVersion,
    owner: config.release.owner,
    repo: config.release.repo
  });

  const ingestor = new TelemetryIngestor({
    ...config.telemetry,
    feedPath: configStore.resolvePath(config.telemetry.feedPath),
    display,
    logger
  });
  const batteryStats = new BatteryStatsReader({
    statsPath: configStore.resolvePath(config.batteryStats.statsPath),
    moduleCount: config.telemetry.moduleCount,
    display,
    logger
  });
  const router = new ControlRouter(orchestrator, batteryStats, () => ingestor.getHealth(), logger);

  scheduler.every('telemetry.poll', config.telemetry.pollIntervalMs, () => ingestor.poll());
  scheduler.every('battery.refresh', config.batteryStats.refreshIntervalMs, () => batteryStats.refresh());

  logger.info('app.bootstrap', {
    baseDir,
    currentVersion: config.currentVersion,
    release: `${config.release.owner}/${config.release.repo}`,
    allowInsecureTls: config.release.allowInsecureTls
  });

  const input = readline.createInterface({ input: process.stdin, terminal: false });
  input.on('line', (line) => {
    router
      .tryExecute(line)
      .then((result) => {
        if (result) {
          process.stdout.write(`${result.content}\n`);
        }
      })
      .catch((error: unknown) => {
        logger.error('app.command.error', { reason: error instanceof Error ? error.message : String(error) });
      });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('app.shutdown', { signal });
    scheduler.stopAll();
    input.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  scheduler.once('update.startup', 0, async () => {
    await orchestrator.runStartupCheck();
  });
}

function applyEnvOverrides(config: DockPanelConfig): DockPanelConfig {
  if (!readBooleanFlag('DOCKPANEL_ALLOW_INSECURE_TLS')) {
    return config;
  }

  return { ...config, release: { ...config.release, allowInsecureTls: true } };
}

function readBooleanFlag(name: string): boolean {
  const value = process.env[name]?.trim().toLowerCase();
  return value === '1' || value === 'true' || value === 'yes' || value === 'on';
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Falha no bootstrap: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
