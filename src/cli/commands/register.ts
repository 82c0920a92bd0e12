import { CliOptions, requireOption } from '../args';
import type { CommandContext } from '../context';
import { EXIT_OK } from '../exitCodes';

/**
 * register: create a model version from a finished run and print the version number
 */
export async function registerCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const modelVersion = await ctx.services.registry.register(
    requireOption(options, 'run-id'),
    requireOption(options, 'model-name'),
    options.description ?? '',
    { allowReregister: options['allow-reregister'] ?? false }
  );

  ctx.out(String(modelVersion.version));
  return EXIT_OK;
}
