import { describe, expect, it, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@main/services/system/CommandRunner';
import { UpdateInstaller } from '@main/services/update/UpdateInstaller';

describe('UpdateInstaller', () => {
  it('lanca o instalador destacado com owner, repo e versao', async () => {
    const { installer, run, logger } = createInstaller(async () => result(0));

    const launched = await installer.launch({ owner: 'acme', repo: 'dock-firmware', version: '1.1.0' });

    expect(launched).toEqual({ ok: true, exitCode: 0, message: 'Instalacao da versao 1.1.0 iniciada.' });
    expect(run).toHaveBeenCalledWith(['python3', 'ota_install.py', 'acme', 'dock-firmware', '1.1.0'], {
      detached: true,
      cwd: '/opt/dockpanel'
    });
    expect(logger.info).toHaveBeenCalledWith('update.install.started', { version: '1.1.0' });
  });

  it('retorna stderr quando o processo nao inicia', async () => {
    const { installer, logger } = createInstaller(async () => result(null, 'spawn python3 ENOENT'));

    const launched = await installer.launch({ owner: 'acme', repo: 'dock-firmware', version: '1.1.0' });

    expect(launched).toEqual({ ok: false, exitCode: null, message: 'spawn python3 ENOENT' });
    expect(logger.error).toHaveBeenCalledWith('update.install.launch_failed', {
      version: '1.1.0',
      exitCode: null,
      reason: 'spawn python3 ENOENT'
    });
  });

  it('descreve exit code quando nao ha stderr', async () => {
    const { installer } = createInstaller(async () => result(2));

    const launched = await installer.launch({ owner: 'acme', repo: 'dock-firmware', version: '1.1.0' });

    expect(launched).toEqual({ ok: false, exitCode: 2, message: 'Instalador terminou com codigo 2.' });
  });

  it('converte excecao do runner em falha', async () => {
    const { installer } = createInstaller(async () => {
      throw new Error('runner indisponivel');
    });

    const launched = await installer.launch({ owner: 'acme', repo: 'dock-firmware', version: '1.1.0' });

    expect(launched).toEqual({ ok: false, exitCode: null, message: 'runner indisponivel' });
  });
});

function createInstaller(impl: CommandRunner['run']) {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
  const run = vi.fn<CommandRunner['run']>(impl);

  const installer = new UpdateInstaller({
    command: 'python3',
    args: ['ota_install.py'],
    cwd: '/opt/dockpanel',
    runner: { run },
    logger
  });

  return { installer, run, logger };
}

function result(exitCode: number | null, stderr = ''): CommandResult {
  return { exitCode, stdout: '', stderr, timedOut: false };
}
