import type { ControlReply, IngestionHealthSnapshot, UpdateState } from '@shared/contracts';
import { CONTROL_HELP } from '@shared/command-help';
import type { Logger, LogEntry } from '@main/services/logging/Logger';
import type { BatteryStatsReader } from '@main/services/telemetry/BatteryStatsReader';
import { pendingVersionOf } from '@main/services/update/UpdateStateStore';
import type { UpdateOrchestrator } from '@main/services/update/UpdateOrchestrator';

const DEFAULT_LOG_LINES = 10;
const MAX_LOG_LINES = 200;

export class ControlRouter {
  constructor(
    private readonly orchestrator: Pick<
      UpdateOrchestrator,
      'checkForUpdate' | 'confirm' | 'cancel' | 'getState' | 'getPolicy' | 'setAutoCheck'
    >,
    private readonly batteryStats: Pick<BatteryStatsReader, 'select' | 'clearSelection' | 'getSelected'>,
    private readonly telemetryHealth: () => IngestionHealthSnapshot,
    private readonly logs: Pick<Logger, 'entries' | 'isHealthy'>
  ) {}

  async tryExecute(input: string): Promise<ControlReply | null> {
    const trimmed = input.trim();
    if (!trimmed.startsWith('/')) {
      return null;
    }

    const [command, ...args] = trimmed.split(/\s+/);

    switch (command) {
      case '/help':
        return reply(CONTROL_HELP.join('\n'));

      case '/check': {
        const outcome = await this.orchestrator.checkForUpdate('manual');
        if (outcome === 'rejected') {
          return reply(`Verificacao ignorada: fluxo de update em ${this.orchestrator.getState().phase}.`);
        }
        return reply(`Verificacao concluida: ${outcome}.`);
      }

      case '/install': {
        const result = await this.orchestrator.confirm();
        if (!result) {
          return reply('Nenhum update aguardando confirmacao.');
        }
        return reply(result.ok ? 'Instalador iniciado.' : `Instalador falhou: ${result.message}`);
      }

      case '/cancel':
        return reply(this.orchestrator.cancel() ? 'Update cancelado.' : 'Nenhum update aguardando confirmacao.');

      case '/auto': {
        const mode = args[0]?.toLowerCase();
        if (mode !== 'on' && mode !== 'off') {
          return reply('Uso: /auto on|off');
        }
        const policy = this.orchestrator.setAutoCheck(mode === 'on');
        return reply(`Verificacao automatica ${policy.autoCheck ? 'ativada' : 'desativada'}.`);
      }

      case '/status':
        return reply(
          formatStatus(
            this.orchestrator.getState(),
            this.orchestrator.getPolicy().autoCheck,
            this.telemetryHealth(),
            this.batteryStats.getSelected(),
            this.logs.isHealthy()
          )
        );

      case '/logs': {
        const limit = args[0] === undefined ? DEFAULT_LOG_LINES : Number(args[0]);
        if (!Number.isInteger(limit) || limit <= 0 || limit > MAX_LOG_LINES) {
          return reply(`Uso: /logs [1-${MAX_LOG_LINES}]`);
        }
        const entries = this.logs.entries(limit);
        return reply(entries.length ? entries.map(formatLogEntry).join('\n') : 'Nenhum registro de log.');
      }

      case '/battery': {
        const arg = args[0]?.toLowerCase();
        if (arg === 'off') {
          this.batteryStats.clearSelection();
          return reply('Painel de bateria fechado.');
        }

        const moduleId = arg !== undefined && /^\d+$/.test(arg) ? Number(arg) : Number.NaN;
        if (!this.batteryStats.select(moduleId)) {
          return reply('Uso: /battery <id>|off');
        }
        return reply(`Painel de bateria aberto para o modulo ${moduleId}.`);
      }

      default:
        return reply(`Comando desconhecido: ${command ?? ''}\n${CONTROL_HELP.join('\n')}`);
    }
  }
}

function formatStatus(
  state: UpdateState,
  autoCheck: boolean,
  health: IngestionHealthSnapshot,
  selectedBattery: number | null,
  logHealthy: boolean
): string {
  const pendingVersion = pendingVersionOf(state);
  const pending = pendingVersion === null ? '' : ` (${pendingVersion})`;
  return [
    `Update: ${state.phase}${pending}`,
    `Verificacao automatica: ${autoCheck ? 'on' : 'off'}`,
    `Telemetria: ${health.healthy ? 'ok' : `falhando (${health.lastFailureKind ?? 'desconhecido'}, ${health.consecutiveFailures} seguidas)`}`,
    `Painel de bateria: ${selectedBattery === null ? 'fechado' : `modulo ${selectedBattery}`}`,
    `Log: ${logHealthy ? 'ok' : 'sem escrita'}`
  ].join('\n');
}

function formatLogEntry(entry: LogEntry): string {
  const meta = entry.meta === undefined ? '' : ` ${JSON.stringify(entry.meta)}`;
  return `${entry.ts} ${entry.level.toUpperCase()} ${entry.message}${meta}`;
}

function reply(content: string): ControlReply {
  return { content };
}
