import type { InstallLaunchResult, InstallerConfig } from '@shared/contracts';
import type { AppLogger } from '@main/services/logging/Logger';
import type { CommandRunner } from '@main/services/system/CommandRunner';

export interface InstallTarget {
  owner: string;
  repo: string;
  version: string;
}

interface UpdateInstallerOptions extends InstallerConfig {
  cwd?: string;
  runner: CommandRunner;
  logger: AppLogger;
}

export class UpdateInstaller {
  private readonly command: string;
  private readonly args: string[];
  private readonly cwd: string | undefined;
  private readonly runner: CommandRunner;
  private readonly logger: AppLogger;

  constructor(options: UpdateInstallerOptions) {
    this.command = options.command;
    this.args = options.args.slice();
    this.cwd = options.cwd;
    this.runner = options.runner;
    this.logger = options.logger;
  }

  async launch(target: InstallTarget): Promise<InstallLaunchResult> {
    const argv = [this.command, ...this.args, target.owner, target.repo, target.version];
    this.logger.info('update.install.launch', { argv });

    try {
      const result = await this.runner.run(argv, { detached: true, cwd: this.cwd });
      if (result.exitCode === 0) {
        this.logger.info('update.install.started', { version: target.version });
        return {
          ok: true,
          exitCode: 0,
          message: `Instalacao da versao ${target.version} iniciada.`
        };
      }

      this.logger.error('update.install.launch_failed', {
        version: target.version,
        exitCode: result.exitCode,
        reason: result.stderr || null
      });
      return {
        ok: false,
        exitCode: result.exitCode,
        message: result.stderr || `Instalador terminou com codigo ${String(result.exitCode)}.`
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('update.install.launch_failed', { version: target.version, reason });
      return { ok: false, exitCode: null, message: reason };
    }
  }
}
