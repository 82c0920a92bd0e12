import type { Dataset } from './DatasetLoader';

/**
 * Fitted encoding: categorical columns map to their sorted category list,
 * every column has a fill value for missing cells.
 */
export interface FeatureEncoding {
  feature_names: string[];
  feature_encoders: Record<string, string[]>;
  imputation: number[];
}

export const UNKNOWN_CATEGORY = -1;

function parseNumber(value: string): number | null {
  if (value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Columns of the dataset that are absent from its header
 */
export function missingColumns(dataset: Dataset, required: string[]): string[] {
  return required.filter((column) => !dataset.columns.includes(column));
}

/**
 * Fit encoders and imputation values on the training rows
 */
export function fitEncoding(rows: Record<string, string>[], featureNames: string[]): FeatureEncoding {
  const featureEncoders: Record<string, string[]> = {};
  const imputation: number[] = [];

  for (const feature of featureNames) {
    const present = rows.map((row) => row[feature]).filter((value) => value !== '');
    const categorical = present.some((value) => parseNumber(value) === null);

    if (categorical) {
      featureEncoders[feature] = [...new Set(present)].sort();
      imputation.push(UNKNOWN_CATEGORY);
      continue;
    }

    const numbers = present.map((value) => Number(value));
    imputation.push(numbers.length > 0 ? numbers.reduce((sum, n) => sum + n, 0) / numbers.length : 0);
  }

  return { feature_names: featureNames, feature_encoders: featureEncoders, imputation };
}

/**
 * Encode rows into a numeric feature matrix using a fitted encoding
 */
export function encodeFeatures(rows: Record<string, string>[], encoding: FeatureEncoding): number[][] {
  return rows.map((row) =>
    encoding.feature_names.map((feature, j) => {
      const value = row[feature] ?? '';
      const categories = encoding.feature_encoders[feature];
      if (value === '') {
        return encoding.imputation[j];
      }
      if (categories) {
        const index = categories.indexOf(value);
        return index >= 0 ? index : UNKNOWN_CATEGORY;
      }
      return parseNumber(value) ?? encoding.imputation[j];
    })
  );
}

function sameLabel(value: string, label: string): boolean {
  if (value === label) return true;
  const a = parseNumber(value);
  const b = parseNumber(label);
  return a !== null && b !== null && a === b;
}

/**
 * The two classes of the target column, as written in the training data
 */
export interface LabelEncoding {
  positive_label: string;
  negative_label: string;
}

function targetValue(row: Record<string, string>, targetColumn: string, index: number): string {
  const value = row[targetColumn] ?? '';
  if (value === '') {
    throw new Error(`Target column '${targetColumn}' is empty in row ${index + 1}`);
  }
  return value;
}

/**
 * Find the negative label: the one value of the target column that is not the positive label
 */
export function fitLabelEncoding(
  rows: Record<string, string>[],
  targetColumn: string,
  positiveLabel: string
): LabelEncoding {
  const negatives: string[] = [];
  rows.forEach((row, index) => {
    const value = targetValue(row, targetColumn, index);
    if (!sameLabel(value, positiveLabel) && !negatives.some((seen) => sameLabel(value, seen))) {
      negatives.push(value);
    }
  });

  if (negatives.length !== 1) {
    const found = negatives.length === 0 ? 'none' : negatives.map((v) => `'${v}'`).join(', ');
    throw new Error(
      `Target column '${targetColumn}' must hold exactly one label besides '${positiveLabel}' (found ${found})`
    );
  }
  return { positive_label: positiveLabel, negative_label: negatives[0] };
}

/**
 * Binary labels: 1 for the positive label, 0 for the negative label.
 * Empty cells and any other value are rejected.
 */
export function encodeLabels(rows: Record<string, string>[], targetColumn: string, labels: LabelEncoding): number[] {
  return rows.map((row, index) => {
    const value = targetValue(row, targetColumn, index);
    if (sameLabel(value, labels.positive_label)) return 1;
    if (sameLabel(value, labels.negative_label)) return 0;
    throw new Error(
      `Target column '${targetColumn}' has unexpected value '${value}' in row ${index + 1} ` +
        `(expected '${labels.positive_label}' or '${labels.negative_label}')`
    );
  });
}
