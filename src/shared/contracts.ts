export interface Version {
  major: number;
  minor: number;
  patch: number;
}

export interface ReleaseInfo {
  tagVersion: Version;
  rawTag: string;
}

export type ReleaseFetchError =
  | { kind: 'connection_failed'; reason: string }
  | { kind: 'auth_failed' }
  | { kind: 'not_found' }
  | { kind: 'api_error'; status: number }
  | { kind: 'invalid_response'; reason: string };

export type ReleaseFetchResult = { ok: true; release: ReleaseInfo } | { ok: false; error: ReleaseFetchError };

export type UpdatePhase = 'idle' | 'checking' | 'awaiting-confirmation' | 'installing' | 'cancelled';

export type UpdateState =
  | { phase: 'idle' }
  | { phase: 'checking' }
  | { phase: 'awaiting-confirmation'; pendingVersion: string }
  | { phase: 'installing'; pendingVersion: string }
  | { phase: 'cancelled' };

export type UpdateCheckTrigger = 'manual' | 'startup';

export type UpdateCheckOutcome =
  | 'rejected'
  | 'no-connectivity'
  | 'up-to-date'
  | 'update-available'
  | 'failed';

export interface UpdatePolicy {
  autoCheck: boolean;
  updatedAt: string;
}

export interface UpdatePolicyPatch {
  autoCheck?: boolean;
}

export interface InstallLaunchResult {
  ok: boolean;
  exitCode: number | null;
  message: string;
}

export type MessageSeverity = 'info' | 'success' | 'warning' | 'error';

export interface ModuleDisplayValue {
  percent: number;
  percentText: string;
  voltageText: string;
  barValue: number;
}

export interface ModuleReading {
  busVoltage: number;
  percent: number;
}

export type TelemetryReading = ReadonlyMap<number, ModuleReading>;

export type IngestionFailureKind = 'missing' | 'read' | 'parse' | 'shape';

export interface IngestionHealthSnapshot {
  healthy: boolean;
  consecutiveFailures: number;
  lastLoggedAt: number | null;
  lastFailureKind: IngestionFailureKind | null;
}

export type BatteryStatField = 'totalChargingTime' | 'wh' | 'ah' | 'minTemp' | 'maxTemp' | 'soh' | 'soc';

export type BatteryStatsView = Partial<Record<BatteryStatField, string>>;

export interface DisplaySurface {
  presentUpdateDecision(version: string): void;
  presentMessage(text: string, severity: MessageSeverity): void;
  updateModule(index: number, value: ModuleDisplayValue): void;
  updateBatteryStats(moduleId: number, stats: BatteryStatsView): void;
}

export interface ControlReply {
  content: string;
}

export interface ReleaseSourceConfig {
  apiBaseUrl: string;
  owner: string;
  repo: string;
  userAgent: string;
  timeoutMs: number;
  allowInsecureTls: boolean;
}

export interface InstallerConfig {
  command: string;
  args: string[];
}

export interface TelemetryConfig {
  feedPath: string;
  pollIntervalMs: number;
  minFileBytes: number;
  moduleCount: number;
  voltageMin: number;
  voltageMax: number;
  voltageWarnCooldownMs: number;
  parseLogCooldownMs: number;
  parseLogStreakThreshold: number;
}

export interface BatteryStatsConfig {
  statsPath: string;
  refreshIntervalMs: number;
}

export interface ConnectivityConfig {
  wirelessInterface: string;
  commandTimeoutMs: number;
}

export interface DockPanelConfig {
  currentVersion: string;
  release: ReleaseSourceConfig;
  tokenFilePath: string;
  installer: InstallerConfig;
  telemetry: TelemetryConfig;
  batteryStats: BatteryStatsConfig;
  connectivity: ConnectivityConfig;
}
