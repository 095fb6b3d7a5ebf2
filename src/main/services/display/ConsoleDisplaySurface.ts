import type { BatteryStatsView, DisplaySurface, MessageSeverity, ModuleDisplayValue } from '@shared/contracts';

const SEVERITY_TAG: Record<MessageSeverity, string> = {
  info: '[info]',
  success: '[ok]',
  warning: '[warn]',
  error: '[erro]'
};

export class ConsoleDisplaySurface implements DisplaySurface {
  private readonly moduleCache = new Map<number, string>();
  private readonly batteryCache = new Map<number, string>();

  constructor(
    private readonly output: NodeJS.WritableStream,
    private readonly options: { showModules?: boolean } = {}
  ) {}

  presentUpdateDecision(version: string): void {
    this.print(`Install update v${version}? Use /install to confirm or /cancel to discard.`);
  }

  presentMessage(text: string, severity: MessageSeverity): void {
    this.print(`${SEVERITY_TAG[severity]} ${text}`);
  }

  updateModule(index: number, value: ModuleDisplayValue): void {
    if (!this.options.showModules) {
      return;
    }

    this.printIfChanged(this.moduleCache, index, `module ${index + 1}: ${value.percentText}% ${value.voltageText} V`);
  }

  updateBatteryStats(moduleId: number, stats: BatteryStatsView): void {
    const parts = Object.entries(stats).map(([field, value]) => `${field}=${value}`);
    this.printIfChanged(this.batteryCache, moduleId, `battery ${moduleId}: ${parts.join(' ')}`);
  }

  // uma linha por chave; repeticoes identicas sao descartadas
  private printIfChanged(cache: Map<number, string>, key: number, line: string): void {
    if (cache.get(key) === line) {
      return;
    }
    cache.set(key, line);
    this.print(line);
  }

  private print(line: string): void {
    this.output.write(`${line}\n`);
  }
}
