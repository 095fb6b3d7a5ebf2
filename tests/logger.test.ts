import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, describe, expect, it } from 'vitest';
import { Logger, parseLogLevel } from '@main/services/logging/Logger';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('Logger', () => {
  it('grava linhas JSON e le de volta em ordem', () => {
    const dir = createTempDir();
    const logger = new Logger(dir);

    logger.info('update.check.start', { trigger: 'manual' });
    logger.error('update.release.auth_failed', { status: 401 });

    const entries = logger.entries();
    expect(entries.map((entry) => [entry.level, entry.message, entry.meta])).toEqual([
      ['info', 'update.check.start', { trigger: 'manual' }],
      ['error', 'update.release.auth_failed', { status: 401 }]
    ]);
    expect(logger.entries(1).map((entry) => entry.message)).toEqual(['update.release.auth_failed']);
    expect(fs.existsSync(path.join(dir, 'logs', 'dockpanel.log'))).toBe(true);
  });

  it('descarta niveis abaixo do minimo configurado', () => {
    const dir = createTempDir();
    const logger = new Logger(dir, { minLevel: 'warn' });

    logger.debug('network.probe.result');
    logger.info('update.check.start');
    logger.warn('telemetry.parse.failed');

    expect(logger.entries().map((entry) => entry.message)).toEqual(['telemetry.parse.failed']);
  });

  it('espelha em arquivo e no console quando configurado', () => {
    const dir = createTempDir();
    const mirror = path.join(dir, 'mirror', 'debug.log');
    let echoed = '';
    const consoleStream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        echoed += chunk.toString('utf-8');
        callback();
      }
    });

    const logger = new Logger(dir, { mirrorFilePath: `  ${mirror}  `, console: consoleStream });
    logger.warn('telemetry.module.voltage_low', { module: 0 });

    expect(fs.readFileSync(mirror, 'utf-8')).toContain('"message":"telemetry.module.voltage_low"');
    expect(echoed).toBe('WARN telemetry.module.voltage_low {"module":0}\n');
    expect(logger.isHealthy()).toBe(true);
  });

  it('interpreta linhas que nao sao JSON como mensagem info', () => {
    const dir = createTempDir();
    const logger = new Logger(dir);
    fs.writeFileSync(path.join(dir, 'logs', 'dockpanel.log'), 'linha solta\n', 'utf-8');

    const [entry] = logger.entries();
    expect(entry?.level).toBe('info');
    expect(entry?.message).toBe('linha solta');
  });
});

describe('parseLogLevel', () => {
  it('normaliza nivel valido e rejeita desconhecido', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('trace')).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockpanel-logger-'));
  tempDirs.push(dir);
  return dir;
}
