import type { IngestionFailureKind, IngestionHealthSnapshot } from '@shared/contracts';
import { LogRateLimiter, type Clock } from '@main/services/telemetry/LogRateLimiter';

interface IngestionHealthOptions {
  cooldownMs: number;
  streakThreshold: number;
  now?: Clock;
}

export interface FailureVerdict {
  shouldLog: boolean;
  consecutiveFailures: number;
}

export interface RecoveryVerdict {
  recovered: boolean;
  consecutiveFailures: number;
}

const LOG_KEY = 'ingestion';

/**
 * Estado de observabilidade do feed. So decide quando emitir log; nunca afeta
 * o que e ingerido.
 *
 * Regra assimetrica: loga na primeira falha apos um ciclo saudavel, e depois so
 * quando a sequencia passa do limite e o cooldown expirou.
 */
export class IngestionHealth {
  private healthy = true;
  private consecutiveFailures = 0;
  private lastFailureKind: IngestionFailureKind | null = null;
  private readonly limiter: LogRateLimiter<typeof LOG_KEY>;
  private readonly streakThreshold: number;

  constructor(options: IngestionHealthOptions) {
    this.limiter = new LogRateLimiter(options.cooldownMs, options.now);
    this.streakThreshold = options.streakThreshold;
  }

  recordFailure(kind: Exclude<IngestionFailureKind, 'missing'>): FailureVerdict {
    const wasHealthy = this.healthy;
    this.consecutiveFailures += 1;
    this.healthy = false;
    this.lastFailureKind = kind;

    const firstAfterHealthy = wasHealthy && this.consecutiveFailures === 1;
    const sustained = this.consecutiveFailures > this.streakThreshold && this.limiter.isReady(LOG_KEY);
    const shouldLog = firstAfterHealthy || sustained;
    if (shouldLog) {
      this.limiter.mark(LOG_KEY);
    }

    return { shouldLog, consecutiveFailures: this.consecutiveFailures };
  }

  // arquivo ausente nao conta na sequencia; retorna true so na transicao saudavel -> indisponivel
  markUnavailable(): boolean {
    const wasHealthy = this.healthy;
    this.healthy = false;
    this.lastFailureKind = 'missing';
    return wasHealthy;
  }

  recordSuccess(): RecoveryVerdict {
    const recovered = !this.healthy || this.consecutiveFailures > 0;
    const consecutiveFailures = this.consecutiveFailures;
    this.healthy = true;
    this.consecutiveFailures = 0;
    this.lastFailureKind = null;
    return { recovered, consecutiveFailures };
  }

  snapshot(): IngestionHealthSnapshot {
    return {
      healthy: this.healthy,
      consecutiveFailures: this.consecutiveFailures,
      lastLoggedAt: this.limiter.lastLogged(LOG_KEY),
      lastFailureKind: this.lastFailureKind
    };
  }
}
