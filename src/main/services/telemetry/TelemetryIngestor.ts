import fs from 'node:fs';
import type {
  DisplaySurface,
  IngestionHealthSnapshot,
  ModuleReading,
  TelemetryConfig,
  TelemetryReading
} from '@shared/contracts';
import type { AppLogger } from '@main/services/logging/Logger';
import { IngestionHealth } from '@main/services/telemetry/IngestionHealth';
import { LogRateLimiter, type Clock } from '@main/services/telemetry/LogRateLimiter';

type TelemetryIngestorSettings = Pick<
  TelemetryConfig,
  | 'minFileBytes'
  | 'moduleCount'
  | 'voltageMin'
  | 'voltageMax'
  | 'voltageWarnCooldownMs'
  | 'parseLogCooldownMs'
  | 'parseLogStreakThreshold'
>;

interface TelemetryIngestorOptions extends TelemetryIngestorSettings {
  feedPath: string;
  display: Pick<DisplaySurface, 'updateModule'>;
  logger: AppLogger;
  now?: Clock;
}

export class TelemetryIngestor {
  private readonly feedPath: string;
  private readonly settings: TelemetryIngestorSettings;
  private readonly display: Pick<DisplaySurface, 'updateModule'>;
  private readonly logger: AppLogger;
  private readonly health: IngestionHealth;
  private readonly voltageWarnings: LogRateLimiter<number>;
  private readonly loggedOnce = new Set<string>();
  private lastReading: TelemetryReading = new Map();

  constructor(options: TelemetryIngestorOptions) {
    const { feedPath, display, logger, now, ...settings } = options;
    this.feedPath = feedPath;
    this.settings = settings;
    this.display = display;
    this.logger = logger;
    this.health = new IngestionHealth({
      cooldownMs: settings.parseLogCooldownMs,
      streakThreshold: settings.parseLogStreakThreshold,
      now
    });
    this.voltageWarnings = new LogRateLimiter(settings.voltageWarnCooldownMs, now);
  }

  getReading(): TelemetryReading {
    return this.lastReading;
  }

  getHealth(): IngestionHealthSnapshot {
    return this.health.snapshot();
  }

  poll(): void {
    let size: number;
    try {
      size = fs.statSync(this.feedPath).size;
    } catch {
      if (this.health.markUnavailable()) {
        this.logger.error('telemetry.feed.missing', { feedPath: this.feedPath });
      }
      return;
    }

    // arquivo menor que o minimo costuma estar no meio de um truncate do escritor
    if (size < this.settings.minFileBytes) {
      return;
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.feedPath, 'utf-8');
    } catch (error) {
      this.reportFailure('read', { reason: toReason(error), size });
      return;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.reportFailure('parse', { reason: toReason(error), preview: raw.slice(0, 50) });
      return;
    }

    const modules = readModules(document);
    if (!modules) {
      this.reportFailure('shape', { reason: "'modules' ausente ou nao e array" });
      return;
    }

    const recovery = this.health.recordSuccess();
    if (recovery.recovered) {
      this.logger.info('telemetry.feed.recovered', { consecutiveFailures: recovery.consecutiveFailures });
    }

    this.lastReading = this.applyModules(modules);
  }

  private applyModules(modules: unknown[]): TelemetryReading {
    const { moduleCount } = this.settings;
    if (modules.length > moduleCount) {
      this.logOnce('module-overflow', () =>
        this.logger.warn('telemetry.modules.overflow', { received: modules.length, limit: moduleCount })
      );
    }

    const reading = new Map<number, ModuleReading>();
    const bounded = modules.slice(0, moduleCount);
    bounded.forEach((entry, index) => {
      const busVoltage = readBusVoltage(entry);
      if (busVoltage === null) {
        this.logOnce(`module-${index}-voltage`, () =>
          this.logger.debug('telemetry.module.voltage_unavailable', { module: index })
        );
        return;
      }

      this.warnIfOutOfBand(index, busVoltage);

      const percent = computePercent(busVoltage, this.settings.voltageMin, this.settings.voltageMax);
      reading.set(index, { busVoltage, percent });
      this.display.updateModule(index, {
        percent,
        percentText: String(percent),
        voltageText: busVoltage.toFixed(1),
        barValue: percent
      });
    });

    return reading;
  }

  private warnIfOutOfBand(index: number, voltage: number): void {
    const { voltageMin, voltageMax } = this.settings;
    if (voltage >= voltageMin && voltage <= voltageMax) {
      return;
    }

    if (!this.voltageWarnings.tryAcquire(index)) {
      return;
    }

    this.logger.warn(voltage < voltageMin ? 'telemetry.module.voltage_low' : 'telemetry.module.voltage_high', {
      module: index,
      voltage: Number(voltage.toFixed(2)),
      limit: voltage < voltageMin ? voltageMin : voltageMax
    });
  }

  private reportFailure(kind: 'read' | 'parse' | 'shape', meta: Record<string, unknown>): void {
    const verdict = this.health.recordFailure(kind);
    if (!verdict.shouldLog) {
      return;
    }

    this.logger.warn(`telemetry.${kind}.failed`, {
      ...meta,
      consecutiveFailures: verdict.consecutiveFailures
    });
  }

  private logOnce(key: string, emit: () => void): void {
    if (this.loggedOnce.has(key)) {
      return;
    }
    this.loggedOnce.add(key);
    emit();
  }
}

export function computePercent(voltage: number, voltageMin: number, voltageMax: number): number {
  const ratio = (voltage - voltageMin) / (voltageMax - voltageMin);
  const percent = Math.round(ratio * 100);
  return Math.min(100, Math.max(0, percent));
}

function readModules(document: unknown): unknown[] | null {
  if (typeof document !== 'object' || document === null || !('modules' in document)) {
    return null;
  }

  const modules = document.modules;
  return Array.isArray(modules) ? modules : null;
}

function readBusVoltage(entry: unknown): number | null {
  if (typeof entry !== 'object' || entry === null || !('bus_voltage' in entry)) {
    return null;
  }

  const value = entry.bus_voltage;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function toReason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
