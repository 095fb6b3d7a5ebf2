import fs from 'node:fs';
import type { BatteryStatField, BatteryStatsView, DisplaySurface } from '@shared/contracts';
import type { AppLogger } from '@main/services/logging/Logger';

interface BatteryStatsReaderOptions {
  statsPath: string;
  moduleCount: number;
  display: Pick<DisplaySurface, 'updateBatteryStats'>;
  logger: AppLogger;
}

const NOT_AVAILABLE = 'N/A';

const FIELD_FORMATS: ReadonlyArray<{ field: BatteryStatField; key: string; format: (value: number) => string }> = [
  { field: 'totalChargingTime', key: 'total_charging_time', format: formatDuration },
  { field: 'wh', key: 'wh', format: (value) => `${value.toFixed(2)} Wh` },
  { field: 'ah', key: 'ah', format: (value) => `${value.toFixed(3)} Ah` },
  { field: 'minTemp', key: 'min_temp', format: (value) => `${value.toFixed(1)} C` },
  { field: 'maxTemp', key: 'max_temp', format: (value) => `${value.toFixed(1)} C` },
  { field: 'soh', key: 'soh', format: (value) => `${value.toFixed(1)} %` },
  { field: 'soc', key: 'soc', format: (value) => `${value.toFixed(1)} %` }
];

/**
 * Painel de detalhes de um modulo selecionado. Le o arquivo de estatisticas
 * sob demanda e no refresh periodico enquanto ha selecao.
 */
export class BatteryStatsReader {
  private readonly statsPath: string;
  private readonly moduleCount: number;
  private readonly display: Pick<DisplaySurface, 'updateBatteryStats'>;
  private readonly logger: AppLogger;
  private selectedModule: number | null = null;

  constructor(options: BatteryStatsReaderOptions) {
    this.statsPath = options.statsPath;
    this.moduleCount = options.moduleCount;
    this.display = options.display;
    this.logger = options.logger;
  }

  getSelected(): number | null {
    return this.selectedModule;
  }

  select(moduleId: number): boolean {
    if (!Number.isInteger(moduleId) || moduleId < 0 || moduleId >= this.moduleCount) {
      this.logger.error('battery.stats.invalid_module', { moduleId, moduleCount: this.moduleCount });
      return false;
    }

    this.selectedModule = moduleId;
    this.refresh();
    return true;
  }

  clearSelection(): void {
    this.selectedModule = null;
  }

  refresh(): void {
    if (this.selectedModule === null) {
      return;
    }

    const moduleId = this.selectedModule;
    let raw: string;
    try {
      raw = fs.readFileSync(this.statsPath, 'utf-8');
    } catch {
      this.logger.warn('battery.stats.file_unavailable', { statsPath: this.statsPath });
      this.display.updateBatteryStats(moduleId, notAvailableView());
      return;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.logger.error('battery.stats.parse_failed', {
        reason: error instanceof Error ? error.message : String(error)
      });
      return;
    }

    const modules = readModules(document);
    if (!modules) {
      this.logger.error('battery.stats.invalid_shape', { statsPath: this.statsPath });
      return;
    }

    const entry = modules.find((item) => readNumber(item, 'id') === moduleId);
    if (entry === undefined) {
      this.logger.warn('battery.stats.module_not_found', { moduleId });
      return;
    }

    const view: BatteryStatsView = {};
    for (const { field, key, format } of FIELD_FORMATS) {
      const value = readNumber(entry, key);
      if (value !== null) {
        view[field] = format(value);
      }
    }

    this.display.updateBatteryStats(moduleId, view);
  }
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.trunc(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  return [hours, minutes, secs].map((part) => String(part).padStart(2, '0')).join(':');
}

function notAvailableView(): BatteryStatsView {
  const view: BatteryStatsView = {};
  for (const { field } of FIELD_FORMATS) {
    view[field] = NOT_AVAILABLE;
  }
  return view;
}

function readModules(document: unknown): unknown[] | null {
  if (typeof document !== 'object' || document === null || !('modules' in document)) {
    return null;
  }

  return Array.isArray(document.modules) ? document.modules : null;
}

function readNumber(entry: unknown, key: string): number | null {
  if (typeof entry !== 'object' || entry === null) {
    return null;
  }

  const value: unknown = Object.getOwnPropertyDescriptor(entry, key)?.value;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
