import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { CredentialLoader } from '@main/services/update/CredentialLoader';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('CredentialLoader', () => {
  it('carrega github_token de arquivo valido', () => {
    const { loader, filePath, logger } = createLoader();
    fs.writeFileSync(filePath, JSON.stringify({ github_token: '  test-secret  ' }), 'utf-8');

    expect(loader.loadToken()).toBe('test-secret');
    expect(logger.info).toHaveBeenCalledWith('update.credentials.loaded', { filePath });
  });

  it('retorna null quando arquivo nao existe', () => {
    const { loader, logger, filePath } = createLoader();

    expect(loader.loadToken()).toBeNull();
    expect(logger.info).toHaveBeenCalledWith('update.credentials.file_missing', { filePath });
  });

  it('retorna null para arquivo acima do limite de tamanho', () => {
    const { loader, filePath, logger } = createLoader();
    fs.writeFileSync(filePath, JSON.stringify({ github_token: 'x'.repeat(10_001) }), 'utf-8');

    expect(loader.loadToken()).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      'update.credentials.invalid_size',
      expect.objectContaining({ maxBytes: 10_000 })
    );
  });

  it('retorna null para arquivo vazio', () => {
    const { loader, filePath } = createLoader();
    fs.writeFileSync(filePath, '', 'utf-8');

    expect(loader.loadToken()).toBeNull();
  });

  it('trata JSON invalido e campo ausente como ausencia de token', () => {
    const { loader, filePath, logger } = createLoader();

    fs.writeFileSync(filePath, '{"github_token": ', 'utf-8');
    expect(loader.loadToken()).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('update.credentials.parse_failed', expect.objectContaining({ filePath }));

    fs.writeFileSync(filePath, JSON.stringify({ other: 'value' }), 'utf-8');
    expect(loader.loadToken()).toBeNull();
    expect(logger.debug).toHaveBeenCalledWith('update.credentials.field_missing', { filePath });

    fs.writeFileSync(filePath, JSON.stringify({ github_token: 42 }), 'utf-8');
    expect(loader.loadToken()).toBeNull();
  });
});

function createLoader() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockpanel-credentials-'));
  tempDirs.push(dir);
  const filePath = path.join(dir, 'ota_config.json');
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };

  return {
    filePath,
    logger,
    loader: new CredentialLoader({ filePath, logger })
  };
}
