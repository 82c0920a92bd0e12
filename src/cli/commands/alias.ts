import { buildPromotionPolicy, computePolicyFingerprint } from '../../services/evaluation/PromotionPolicy';
import { ConfigError } from '../../types/ModelGateErrors';
import { CliOptions, optionalVersion, parseVersion, requireOption } from '../args';
import type { CommandContext } from '../context';
import { EXIT_OK } from '../exitCodes';

/**
 * promote: move an alias (default: the production alias) to a version, gated by the
 * latest decision under the current policy unless --override is given
 */
export async function promoteCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const modelName = requireOption(options, 'model-name');
  const version = parseVersion(requireOption(options, 'version'), 'version');
  const alias = options.alias ?? ctx.config.registry.default_alias;
  const { evaluation } = ctx.config;

  if (options['override-reason'] && !options.override) {
    throw new ConfigError('--override-reason is only valid with --override');
  }
  const override = options.override ? { reason: requireOption(options, 'override-reason') } : undefined;

  const { binding } = await ctx.services.promotions.promote({
    modelName,
    version,
    alias,
    policyFingerprint: computePolicyFingerprint(buildPromotionPolicy(evaluation.thresholds, evaluation.baseline)),
    override,
    expectedVersion: optionalVersion(options, 'expected-version'),
    actor: ctx.actor,
  });

  const previous = binding.previous_version !== undefined ? ` (was v${binding.previous_version})` : '';
  ctx.out(`${modelName}@${alias} -> v${binding.version}${previous} [${binding.mode}]`);
  return EXIT_OK;
}

/**
 * set-alias: bind a currently unbound alias
 */
export async function setAliasCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const modelName = requireOption(options, 'model-name');
  const alias = requireOption(options, 'alias');
  const binding = await ctx.services.promotions.assignAlias({
    modelName,
    alias,
    version: parseVersion(requireOption(options, 'version'), 'version'),
    actor: ctx.actor,
  });

  ctx.out(`${modelName}@${alias} -> v${binding.version} [${binding.mode}]`);
  return EXIT_OK;
}

/**
 * delete-alias: unbind an alias
 */
export async function deleteAliasCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const modelName = requireOption(options, 'model-name');
  const alias = requireOption(options, 'alias');
  await ctx.services.promotions.removeAlias({
    modelName,
    alias,
    expectedVersion: optionalVersion(options, 'expected-version'),
    actor: ctx.actor,
  });

  ctx.out(`${modelName}@${alias} removed`);
  return EXIT_OK;
}
