import { loadDataset } from '../../services/data/DatasetLoader';
import { writePredictions } from '../../services/data/PredictionWriter';
import { buildPromotionPolicy } from '../../services/evaluation/PromotionPolicy';
import type { BaselineTarget } from '../../services/evaluation/ModelEvaluator';
import type { GateDecision } from '../../types/EvaluationTypes';
import { ConfigError } from '../../types/ModelGateErrors';
import { CliOptions, optionalVersion, requireOption } from '../args';
import type { CommandContext } from '../context';
import { EXIT_GATE_FAILED, EXIT_OK } from '../exitCodes';

function baselineTarget(options: CliOptions, ctx: CommandContext): BaselineTarget | undefined {
  const configured = ctx.config.evaluation.baseline;
  const modelName = options['model-name'] ?? (configured ? ctx.config.model.name : undefined);
  const version = optionalVersion(options, 'baseline-version');
  if (!modelName) {
    if (version !== undefined || options['baseline-alias']) {
      throw new ConfigError('--model-name is required with --baseline-version or --baseline-alias');
    }
    return undefined;
  }
  if (version !== undefined && options['baseline-alias']) {
    throw new ConfigError('Use either --baseline-version or --baseline-alias, not both');
  }
  if (version !== undefined) {
    return { modelName, version };
  }
  return {
    modelName,
    alias: options['baseline-alias'] ?? configured?.alias ?? ctx.config.registry.default_alias,
  };
}

export function formatDecision(decision: GateDecision): string[] {
  const lines = [
    `Gate decision ${decision.decision_id}: ${decision.passed ? 'PASSED' : 'FAILED'}`,
    `  run: ${decision.run_id}`,
    `  policy: ${decision.policy_fingerprint}`,
  ];
  for (const [metric, value] of Object.entries(decision.metrics)) {
    lines.push(`  ${metric}: ${value.toFixed(4)}`);
  }
  if (decision.baseline_comparison) {
    const b = decision.baseline_comparison;
    lines.push(
      `  baseline ${b.model_name} v${b.version}: ${b.metric} ${b.baseline_value.toFixed(4)} → ${b.candidate_value.toFixed(4)}`
    );
  }
  for (const reason of decision.reasons) {
    lines.push(`  - ${reason.message}`);
  }
  for (const attribution of decision.attributions ?? []) {
    lines.push(`  * ${attribution.feature}: ${attribution.importance.toFixed(4)}`);
  }
  return lines;
}

/**
 * eval: score a run on a held-out dataset, record the gate decision, write predictions.
 * With --validate-thresholds a failed decision exits non-zero.
 */
export async function evalCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const runId = requireOption(options, 'run-id');
  const outputPath = requireOption(options, 'output-path-prediction');
  const dataset = loadDataset(requireOption(options, 'eval-data-path'));
  const { evaluation } = ctx.config;

  const { decision, probabilities } = await ctx.services.evaluator.evaluate({
    runId,
    dataset,
    policy: buildPromotionPolicy(evaluation.thresholds, evaluation.baseline),
    decisionThreshold: evaluation.decision_threshold,
    baseline: baselineTarget(options, ctx),
    ...(evaluation.explain.enable ? { explain: { maxFeatures: evaluation.explain.max_features } } : {}),
  });

  writePredictions(outputPath, dataset, probabilities, evaluation.decision_threshold);
  ctx.logger.info('Predictions written', { path: outputPath, rows: probabilities.length });

  formatDecision(decision).forEach((line) => ctx.out(line));

  if (options['validate-thresholds'] && !decision.passed) {
    return EXIT_GATE_FAILED;
  }
  return EXIT_OK;
}
