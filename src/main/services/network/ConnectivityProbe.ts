import type { AppLogger } from '@main/services/logging/Logger';
import { firstOutputLine, type CommandRunner } from '@main/services/system/CommandRunner';

type CheckVerdict = 'connected' | 'disconnected' | 'unknown';

interface ConnectivityProbeOptions {
  runner: CommandRunner;
  logger: AppLogger;
  wirelessInterface?: string;
  commandTimeoutMs?: number;
}

/**
 * Consulta o NetworkManager e a tabela de rotas para decidir se ha caminho de rede.
 * Cada verificacao e consultiva: ferramenta ausente ou exit code diferente de zero
 * vira "desconhecido" e a proxima verificacao decide.
 */
export class ConnectivityProbe {
  private readonly runner: CommandRunner;
  private readonly logger: AppLogger;
  private readonly wirelessInterface: string;
  private readonly commandTimeoutMs: number;

  constructor(options: ConnectivityProbeOptions) {
    this.runner = options.runner;
    this.logger = options.logger;
    this.wirelessInterface = options.wirelessInterface?.trim() || 'wlan0';
    this.commandTimeoutMs = options.commandTimeoutMs ?? 3000;
  }

  async hasConnectivity(): Promise<boolean> {
    const serviceActive = await this.isNetworkServiceActive();

    if (serviceActive) {
      const general = await this.checkGeneralState();
      if (general === 'disconnected') {
        this.logger.debug('network.probe.result', { connected: false, via: 'general-state' });
        return false;
      }

      const wireless = await this.checkWirelessInterface();
      if (wireless !== 'unknown') {
        const connected = wireless === 'connected';
        this.logger.debug('network.probe.result', { connected, via: 'wireless', device: this.wirelessInterface });
        return connected;
      }
    }

    const route = await this.checkDefaultRoute();
    const connected = route === 'connected';
    this.logger.debug('network.probe.result', { connected, via: 'default-route', serviceActive });
    return connected;
  }

  private async isNetworkServiceActive(): Promise<boolean> {
    const output = await this.capture(['systemctl', 'is-active', 'NetworkManager.service']);
    return output === 'active';
  }

  private async checkGeneralState(): Promise<CheckVerdict> {
    const output = await this.capture(['nmcli', '-t', '-f', 'STATE', 'general']);
    if (output === null) {
      return 'unknown';
    }

    return output.startsWith('connected') ? 'connected' : 'disconnected';
  }

  private async checkWirelessInterface(): Promise<CheckVerdict> {
    const output = await this.capture(['nmcli', '-t', '-f', 'GENERAL.STATE', 'device', 'show', this.wirelessInterface]);
    if (output === null) {
      return 'unknown';
    }

    // saida terse: "GENERAL.STATE:100 (connected)"
    const state = output.includes(':') ? output.slice(output.indexOf(':') + 1) : output;
    return /^100\b/.test(state) || state.includes('(connected)') ? 'connected' : 'disconnected';
  }

  private async checkDefaultRoute(): Promise<CheckVerdict> {
    const output = await this.capture(['ip', 'route', 'show', 'default']);
    if (output === null) {
      return 'unknown';
    }

    return output.startsWith('default') ? 'connected' : 'disconnected';
  }

  private async capture(argv: string[]): Promise<string | null> {
    try {
      const result = await this.runner.run(argv, { timeoutMs: this.commandTimeoutMs });
      if (result.exitCode !== 0) {
        this.logger.debug('network.probe.check_unavailable', {
          command: argv.join(' '),
          exitCode: result.exitCode,
          timedOut: result.timedOut
        });
        return null;
      }

      return firstOutputLine(result.stdout) ?? '';
    } catch (error) {
      this.logger.debug('network.probe.check_unavailable', {
        command: argv.join(' '),
        reason: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }
}
