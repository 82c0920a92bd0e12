import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'json2csv';
import type { Dataset } from './DatasetLoader';

export const PROBABILITY_COLUMN = 'probability';
export const PREDICTION_COLUMN = 'prediction';

/**
 * Original columns followed by the positive-class probability and the 0/1 prediction
 */
export function formatPredictions(dataset: Dataset, probabilities: number[], decisionThreshold: number): string {
  const records = dataset.rows.map((row, i) => ({
    ...row,
    [PROBABILITY_COLUMN]: probabilities[i],
    [PREDICTION_COLUMN]: probabilities[i] >= decisionThreshold ? 1 : 0,
  }));

  return parse(records, {
    fields: [...dataset.columns.filter((c) => c !== PROBABILITY_COLUMN && c !== PREDICTION_COLUMN), PROBABILITY_COLUMN, PREDICTION_COLUMN],
  });
}

/**
 * Write predictions as CSV, creating the parent directory if needed
 */
export function writePredictions(
  outputPath: string,
  dataset: Dataset,
  probabilities: number[],
  decisionThreshold: number
): void {
  fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
  fs.writeFileSync(outputPath, formatPredictions(dataset, probabilities, decisionThreshold));
}
