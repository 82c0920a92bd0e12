import type { AliasBinding, ModelVersion } from '../../types/RegistryTypes';
import { ModelNotFoundError } from '../../types/ModelGateErrors';
import { CliOptions, parseVersion, requireOption } from '../args';
import type { CommandContext } from '../context';
import { EXIT_OK } from '../exitCodes';

function formatVersion(version: ModelVersion): string {
  const aliases = version.aliases.length > 0 ? ` [${version.aliases.join(', ')}]` : '';
  const description = version.description ? `  ${version.description}` : '';
  return `  v${version.version}${aliases}  run=${version.run_id}  registered=${version.created_at}${description}`;
}

function formatAlias(binding: AliasBinding): string {
  const reason = binding.audit_reason ? `  reason="${binding.audit_reason}"` : '';
  return `  @${binding.alias} -> v${binding.version}  ${binding.mode} by ${binding.updated_by} at ${binding.updated_at}${reason}`;
}

/**
 * list: every registered model with its versions
 */
export async function listCommand(_options: CliOptions, ctx: CommandContext): Promise<number> {
  const models = await ctx.services.registry.listModels();
  if (models.length === 0) {
    ctx.out('No registered models');
    return EXIT_OK;
  }

  for (const model of models) {
    const versions = await ctx.services.registry.listVersions(model.model_name);
    ctx.out(`${model.model_name} (${versions.length} version${versions.length === 1 ? '' : 's'})`);
    versions.forEach((version) => ctx.out(formatVersion(version)));
  }
  return EXIT_OK;
}

/**
 * info: versions, aliases and descriptions of one model
 */
export async function infoCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const modelName = requireOption(options, 'model-name');
  const model = await ctx.services.registry.getModel(modelName);
  if (!model) {
    throw new ModelNotFoundError(modelName);
  }

  const versions = await ctx.services.registry.listVersions(modelName);
  const aliases = await ctx.services.registry.listAliases(modelName);

  ctx.out(`Model: ${model.model_name}`);
  ctx.out(`Created: ${model.created_at}`);
  ctx.out(`Latest allocated version: ${model.latest_version}`);
  ctx.out('Versions:');
  versions.forEach((version) => ctx.out(formatVersion(version)));
  ctx.out('Aliases:');
  if (aliases.length === 0) {
    ctx.out('  (none)');
  }
  aliases.forEach((binding) => ctx.out(formatAlias(binding)));
  return EXIT_OK;
}

/**
 * delete-version: remove a version no alias binds
 */
export async function deleteVersionCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const modelName = requireOption(options, 'model-name');
  const version = parseVersion(requireOption(options, 'version'), 'version');
  await ctx.services.registry.deleteVersion(modelName, version);
  ctx.out(`${modelName} v${version} deleted`);
  return EXIT_OK;
}

/**
 * update-description: replace a version's description
 */
export async function updateDescriptionCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const modelName = requireOption(options, 'model-name');
  const version = parseVersion(requireOption(options, 'version'), 'version');
  const updated = await ctx.services.registry.updateDescription(
    modelName,
    version,
    requireOption(options, 'description')
  );
  ctx.out(formatVersion(updated));
  return EXIT_OK;
}
