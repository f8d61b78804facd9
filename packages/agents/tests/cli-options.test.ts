// Tests for CLI argument parsing

import { describe, it, expect } from 'vitest';
import { parseCliOptions } from '../src/cli-options.js';
import { ConfigError } from '../utils/errors.js';

describe('parseCliOptions', () => {
  it('defaults to snapshots on and everything else off', () => {
    expect(parseCliOptions(['7203'])).toEqual({
      positionals: ['7203'],
      settings: {},
      json: false,
      notify: false,
      snapshot: true,
      help: false,
    });
  });

  it('collects flags and settings in any order', () => {
    const options = parseCliOptions([
      '--json', '7203', '-m', 'test-model', '--debate-rounds', '2', '6758',
      '--lang', 'JA', '--notify', '--no-snapshot', '--timeout', '5000',
      '--max-concurrent', '4', '--temperature', '0.5',
    ]);

    expect(options).toEqual({
      positionals: ['7203', '6758'],
      settings: {
        model: 'test-model',
        debateRounds: 2,
        language: 'ja',
        taskTimeoutMs: 5000,
        maxConcurrent: 4,
        temperature: 0.5,
      },
      json: true,
      notify: true,
      snapshot: false,
      help: false,
    });
  });

  it('recognizes help', () => {
    expect(parseCliOptions(['-h']).help).toBe(true);
  });

  it('rejects a flag without its value', () => {
    expect(() => parseCliOptions(['--model'])).toThrow('Missing value for --model');
    expect(() => parseCliOptions(['--timeout', '--json'])).toThrow('Missing value for --timeout');
  });

  it('rejects non-numeric values', () => {
    expect(() => parseCliOptions(['--debate-rounds', 'two'])).toThrow('Invalid value for --debate-rounds: "two"');
  });

  it('rejects unsupported languages', () => {
    expect(() => parseCliOptions(['--lang', 'fr'])).toThrow(ConfigError);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliOptions(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseCliOptions(['--constructor'])).toThrow('Unknown option: --constructor');
  });
});
