import { describe, expect, it } from 'vitest';
import { loadCliOptions } from '../src/config';
import { counts } from './helpers';

describe('cli options', () => {
  it('falls back to defaults', () => {
    expect(loadCliOptions([], {})).toEqual({
      help: false,
      verbose: false,
      count: 1,
      width: 10,
      height: 10,
      render: false,
      p1: 'probability',
      p2: 'probability',
    });
  });

  it('reads short and long flags', () => {
    const options = loadCliOptions(
      ['-v', '-c', '5', '-W', '8', '-H', '6', '-l', '1, 0, 2,0,0,0,1', '-s', '42', '--p2', 'scan', '--render'],
      {}
    );
    expect(options.verbose).toBe(true);
    expect(options.count).toBe(5);
    expect(options.width).toBe(8);
    expect(options.height).toBe(6);
    expect(options.list).toEqual(counts({ 1: 1, 3: 2, 7: 1 }));
    expect(options.seed).toBe(42);
    expect(options.p2).toBe('scan');
    expect(options.render).toBe(true);
  });

  it('takes the seed and log directory from the environment unless flagged', () => {
    const env = { BATTLE_SEED: '9', BATTLE_LOG_DIR: 'logs' };
    expect(loadCliOptions([], env)).toMatchObject({ seed: 9, logDir: 'logs' });
    expect(loadCliOptions(['-s', '3', '--log-dir', 'out'], env)).toMatchObject({ seed: 3, logDir: 'out' });
  });

  it('reports invalid values by option', () => {
    expect(() => loadCliOptions(['-l', '1,2'], {})).toThrow('list: Ship counts must be 7 comma-separated integers');
    expect(() => loadCliOptions(['--p1', 'nobody'], {})).toThrow('p1: Unknown player "nobody"');
    expect(() => loadCliOptions(['--p1', 'toString'], {})).toThrow('p1: Unknown player "toString"');
    expect(() => loadCliOptions(['-c', '0'], {})).toThrow(/^count: /);
    expect(() => loadCliOptions(['--watch', 'not a url'], {})).toThrow(/^watch: /);
  });

  it('rejects unknown flags', () => {
    expect(() => loadCliOptions(['--fast'], {})).toThrow();
  });
});
