import { parseArgs } from 'util';
import { ConfigError } from '../types/ModelGateErrors';

const OPTIONS = {
  config: { type: 'string' },
  'training-data-path': { type: 'string' },
  'experiment-name': { type: 'string' },
  'run-name': { type: 'string' },
  'run-id': { type: 'string' },
  'eval-data-path': { type: 'string' },
  'output-path-prediction': { type: 'string' },
  'validate-thresholds': { type: 'boolean' },
  'model-name': { type: 'string' },
  'baseline-version': { type: 'string' },
  'baseline-alias': { type: 'string' },
  description: { type: 'string' },
  'allow-reregister': { type: 'boolean' },
  version: { type: 'string' },
  alias: { type: 'string' },
  'expected-version': { type: 'string' },
  override: { type: 'boolean' },
  'override-reason': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

export interface CliOptions {
  config?: string;
  'training-data-path'?: string;
  'experiment-name'?: string;
  'run-name'?: string;
  'run-id'?: string;
  'eval-data-path'?: string;
  'output-path-prediction'?: string;
  'validate-thresholds'?: boolean;
  'model-name'?: string;
  'baseline-version'?: string;
  'baseline-alias'?: string;
  description?: string;
  'allow-reregister'?: boolean;
  version?: string;
  alias?: string;
  'expected-version'?: string;
  override?: boolean;
  'override-reason'?: string;
  help?: boolean;
}

type StringOption = {
  [K in keyof CliOptions]-?: NonNullable<CliOptions[K]> extends string ? K : never;
}[keyof CliOptions];

export interface CommandLine {
  command?: string;
  options: CliOptions;
}

export function parseCommandLine(argv: string[]): CommandLine {
  try {
    const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
    if (positionals.length > 1) {
      throw new ConfigError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
    }
    return { command: positionals[0], options: values };
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

export function requireOption(options: CliOptions, name: StringOption): string {
  const value = options[name];
  if (value === undefined || value.trim() === '') {
    throw new ConfigError(`--${name} is required`);
  }
  return value;
}

export function parseVersion(value: string, flag: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ConfigError(`--${flag} must be a positive integer (got '${value}')`);
  }
  return Number(value);
}

export function optionalVersion(options: CliOptions, name: StringOption): number | undefined {
  const value = options[name];
  return value === undefined ? undefined : parseVersion(value, name);
}

export const USAGE = `Usage: model-gate <command> --config <path> [options]

Commands:
  train               --training-data-path <csv> [--experiment-name <name>] [--run-name <name>]
  eval                --run-id <id> --eval-data-path <csv> --output-path-prediction <csv>
                      [--validate-thresholds] [--model-name <name> [--baseline-version <n> | --baseline-alias <alias>]]
  register            --run-id <id> --model-name <name> [--description <text>] [--allow-reregister]
  promote             --model-name <name> --version <n> [--alias <alias>] [--expected-version <n>]
                      [--override --override-reason <text>]
  set-alias           --model-name <name> --alias <alias> --version <n>
  delete-alias        --model-name <name> --alias <alias> [--expected-version <n>]
  delete-version      --model-name <name> --version <n>
  update-description  --model-name <name> --version <n> --description <text>
  list
  info                --model-name <name>
`;
