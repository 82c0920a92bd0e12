import { toHyperparameters } from '../../config/pipelineConfig';
import { loadDataset } from '../../services/data/DatasetLoader';
import { CliOptions, requireOption } from '../args';
import type { CommandContext } from '../context';
import { EXIT_OK } from '../exitCodes';

/**
 * train: fit a model under a new run and print the run id
 */
export async function trainCommand(options: CliOptions, ctx: CommandContext): Promise<number> {
  const dataset = loadDataset(requireOption(options, 'training-data-path'));
  const { config } = ctx;

  ctx.logger.info('Loaded training data', { rows: dataset.rows.length, columns: dataset.columns.length });

  const result = await ctx.services.trainingRunner.train({
    dataset,
    modelName: config.model.name,
    hyperparameters: toHyperparameters(config.model),
    features: config.features,
    experimentName: options['experiment-name'] ?? config.tracking.experiment_name,
    runName: options['run-name'],
    tags: config.tracking.tags,
  });

  ctx.out(result.runId);
  return EXIT_OK;
}
