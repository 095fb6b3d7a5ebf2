import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { DockPanelConfig } from '@shared/contracts';

const versionPattern = /^v?\d+(\.\d+){0,2}$/;

const configSchema = z.object({
  currentVersion: z.string().regex(versionPattern).default('1.0.3'),
  release: z
    .object({
      apiBaseUrl: z.string().url().default('https://api.github.com'),
      owner: z.string().min(1).default('dockpanel'),
      repo: z.string().min(1).default('dockpanel-firmware'),
      userAgent: z.string().min(1).default('DockPanel-OTA/1.0'),
      timeoutMs: z.number().int().positive().default(10_000),
      allowInsecureTls: z.boolean().default(false)
    })
    .default({}),
  tokenFilePath: z.string().min(1).default('ota_config.json'),
  installer: z
    .object({
      command: z.string().min(1).default('python3'),
      args: z.array(z.string()).default(['ota_install.py'])
    })
    .default({}),
  telemetry: z
    .object({
      feedPath: z.string().min(1).default('gui_data.json'),
      pollIntervalMs: z.number().int().positive().default(500),
      minFileBytes: z.number().int().nonnegative().default(50),
      moduleCount: z.number().int().min(1).max(32).default(8),
      voltageMin: z.number().default(18.0),
      voltageMax: z.number().default(21.0),
      voltageWarnCooldownMs: z.number().int().nonnegative().default(60_000),
      parseLogCooldownMs: z.number().int().nonnegative().default(10_000),
      parseLogStreakThreshold: z.number().int().nonnegative().default(20)
    })
    .refine((value) => value.voltageMax > value.voltageMin, { message: 'voltageMax must exceed voltageMin' })
    .default({}),
  batteryStats: z
    .object({
      statsPath: z.string().min(1).default('battery_stats.json'),
      refreshIntervalMs: z.number().int().positive().default(2000)
    })
    .default({}),
  connectivity: z
    .object({
      wirelessInterface: z.string().min(1).default('wlan0'),
      commandTimeoutMs: z.number().int().positive().default(3000)
    })
    .default({})
});

export function createDefaultConfig(): DockPanelConfig {
  return configSchema.parse({});
}

export class ConfigStore {
  private readonly baseDir: string;
  private readonly filePath: string;
  private cache: DockPanelConfig;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'dockpanel.config.json');
    this.cache = this.load();
  }

  get(): DockPanelConfig {
    return this.cache;
  }

  // caminhos relativos no arquivo de config sao relativos ao diretorio base
  resolvePath(value: string): string {
    return path.resolve(this.baseDir, value);
  }

  private load(): DockPanelConfig {
    if (!fs.existsSync(this.filePath)) {
      const initial = createDefaultConfig();
      this.persist(initial);
      return initial;
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = configSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
    } catch {
      // fallback
    }

    const fallback = createDefaultConfig();
    this.persist(fallback);
    return fallback;
  }

  private persist(config: DockPanelConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
