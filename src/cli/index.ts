#!/usr/bin/env node
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { loadPipelineConfig } from '../config/pipelineConfig';
import { Logger } from '../services/core/Logger';
import { ConfigError, ModelGateError } from '../types/ModelGateErrors';
import { CliOptions, parseCommandLine, requireOption, USAGE } from './args';
import { CommandContext, createServices, ServicesFactory } from './context';
import { EXIT_CONFIG_ERROR, EXIT_OK, exitCodeFor } from './exitCodes';
import { trainCommand } from './commands/train';
import { evalCommand } from './commands/evaluate';
import { registerCommand } from './commands/register';
import { deleteAliasCommand, promoteCommand, setAliasCommand } from './commands/alias';
import {
  deleteVersionCommand,
  infoCommand,
  listCommand,
  updateDescriptionCommand,
} from './commands/versions';

type CommandHandler = (options: CliOptions, ctx: CommandContext) => Promise<number>;

const COMMANDS: Record<string, CommandHandler> = {
  train: trainCommand,
  eval: evalCommand,
  register: registerCommand,
  promote: promoteCommand,
  'set-alias': setAliasCommand,
  'delete-alias': deleteAliasCommand,
  'delete-version': deleteVersionCommand,
  'update-description': updateDescriptionCommand,
  list: listCommand,
  info: infoCommand,
};

export interface CliDependencies {
  createServices?: ServicesFactory;
  out?: (line: string) => void;
  err?: (line: string) => void;
  actor?: string;
}

function loadEnvironment(): void {
  for (const file of ['.env', '.env.local']) {
    const envPath = path.join(process.cwd(), file);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
    }
  }
}

/**
 * Run one command; resolves to the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));

  try {
    const { command, options } = parseCommandLine(argv);
    if (options.help) {
      out(USAGE);
      return EXIT_OK;
    }
    if (!command) {
      err(USAGE);
      return EXIT_CONFIG_ERROR;
    }
    const handler = COMMANDS[command];
    if (!handler) {
      throw new ConfigError(`Unknown command '${command}'`);
    }

    const config = loadPipelineConfig(requireOption(options, 'config'));
    const logger = new Logger('ModelGate', { command });
    const actor = deps.actor ?? process.env.MODEL_GATE_ACTOR ?? process.env.USER ?? 'model-gate';
    const services = (deps.createServices ?? createServices)(config, logger, actor);

    return await handler(options, { config, services, logger, actor, out });
  } catch (error) {
    const code = exitCodeFor(error);
    if (error instanceof ModelGateError) {
      err(`Error [${error.error_code}]: ${error.message}`);
    } else {
      err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return code;
  }
}

if (require.main === module) {
  loadEnvironment();
  runCli(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error('Fatal error:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}
