import { Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { ConsoleDisplaySurface } from '@main/services/display/ConsoleDisplaySurface';

describe('ConsoleDisplaySurface', () => {
  it('imprime decisao de update e mensagens com severidade', () => {
    const { display, lines } = createDisplay();

    display.presentUpdateDecision('1.1.0');
    display.presentMessage('Software is up to date', 'info');
    display.presentMessage('Update started - check logs', 'success');
    display.presentMessage('OTA: Connection failed', 'error');

    expect(lines()).toEqual([
      'Install update v1.1.0? Use /install to confirm or /cancel to discard.',
      '[info] Software is up to date',
      '[ok] Update started - check logs',
      '[erro] OTA: Connection failed'
    ]);
  });

  it('so imprime modulos quando habilitado e quando o valor muda', () => {
    const { display, lines } = createDisplay(true);
    const value = { percent: 50, percentText: '50', voltageText: '19.5', barValue: 50 };

    display.updateModule(0, value);
    display.updateModule(0, value);
    display.updateModule(0, { ...value, percent: 51, percentText: '51', voltageText: '19.5' });

    expect(lines()).toEqual(['module 1: 50% 19.5 V', 'module 1: 51% 19.5 V']);

    const quiet = createDisplay(false);
    quiet.display.updateModule(0, value);
    expect(quiet.lines()).toEqual([]);
  });

  it('imprime estatisticas de bateria na ordem dos campos', () => {
    const { display, lines } = createDisplay();

    display.updateBatteryStats(2, { wh: '12.35 Wh', soc: '64.4 %' });

    expect(lines()).toEqual(['battery 2: wh=12.35 Wh soc=64.4 %']);
  });

  it('nao repete estatisticas de bateria inalteradas entre refreshes', () => {
    const { display, lines } = createDisplay();

    display.updateBatteryStats(2, { soc: '64.4 %' });
    display.updateBatteryStats(2, { soc: '64.4 %' });
    display.updateBatteryStats(3, { soc: '64.4 %' });
    display.updateBatteryStats(2, { soc: '64.5 %' });

    expect(lines()).toEqual(['battery 2: soc=64.4 %', 'battery 3: soc=64.4 %', 'battery 2: soc=64.5 %']);
  });
});

function createDisplay(showModules?: boolean) {
  let buffer = '';
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      buffer += chunk.toString('utf-8');
      callback();
    }
  });

  const display = new ConsoleDisplaySurface(output, { showModules });
  const lines = () => buffer.split('\n').filter(Boolean);
  return { display, lines };
}
