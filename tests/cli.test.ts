import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/cli.js';

describe('parseArgs', () => {
  it('should parse run with a config path and --once', () => {
    expect(parseArgs(['run', 'prod.ini', '--once'])).toEqual({ kind: 'run', configPath: 'prod.ini', once: true });
    expect(parseArgs(['run', '--once', 'prod.ini'])).toEqual({ kind: 'run', configPath: 'prod.ini', once: true });
  });

  it('should default the config path', () => {
    expect(parseArgs(['run'])).toEqual({ kind: 'run', configPath: 'config.ini', once: false });
    expect(parseArgs(['init'])).toEqual({ kind: 'init', configPath: 'config.ini' });
    expect(parseArgs(['init', 'my.ini'])).toEqual({ kind: 'init', configPath: 'my.ini' });
  });

  it('should fall back to help', () => {
    expect(parseArgs([])).toEqual({ kind: 'help' });
    expect(parseArgs(['backtest'])).toEqual({ kind: 'help' });
  });
});
