// Argument parsing for the signal-desk CLI. Values are only shape-checked
// here; range checks happen in loadSettings.

import type { PipelineSettingsInput } from '../config/settings.js';
import { LANGUAGES } from '../types/agents.js';
import { ConfigError } from '../utils/errors.js';

export interface CliOptions {
  positionals: string[];
  settings: PipelineSettingsInput;
  json: boolean;
  notify: boolean;
  snapshot: boolean;
  help: boolean;
}

type NumericSetting = 'debateRounds' | 'taskTimeoutMs' | 'maxConcurrent' | 'temperature';

const NUMERIC_FLAGS: Record<string, NumericSetting> = {
  '--debate-rounds': 'debateRounds',
  '--timeout': 'taskTimeoutMs',
  '--max-concurrent': 'maxConcurrent',
  '--temperature': 'temperature',
};

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid value for ${flag}: "${raw}"`);
  }
  return value;
}

export function parseCliOptions(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    positionals: [],
    settings: {},
    json: false,
    notify: false,
    snapshot: true,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takeValue = (): string => {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) throw new ConfigError(`Missing value for ${arg}`);
      i++;
      return value;
    };

    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--notify') {
      options.notify = true;
    } else if (arg === '--no-snapshot') {
      options.snapshot = false;
    } else if (arg === '--model' || arg === '-m') {
      options.settings.model = takeValue();
    } else if (arg === '--lang' || arg === '-l') {
      const raw = takeValue();
      const language = LANGUAGES.find((l) => l === raw.toLowerCase());
      if (!language) throw new ConfigError(`Invalid language "${raw}". Valid: ${LANGUAGES.join(', ')}`);
      options.settings.language = language;
    } else if (Object.hasOwn(NUMERIC_FLAGS, arg)) {
      options.settings[NUMERIC_FLAGS[arg]] = parseNumber(arg, takeValue());
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      options.positionals.push(arg);
    }
  }
  return options;
}
