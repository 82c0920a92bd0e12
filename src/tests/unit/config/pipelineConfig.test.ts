import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadPipelineConfig, parsePipelineConfig, toHyperparameters } from '../../../config/pipelineConfig';
import { ConfigError } from '../../../types/ModelGateErrors';
import { BASE_CONFIG } from '../../__mocks__/fixtures';

describe('pipelineConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'model-gate-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('parsePipelineConfig', () => {
    it('applies defaults to a minimal document', () => {
      const config = parsePipelineConfig(BASE_CONFIG);

      expect(config.tracking.region).toBe('us-east-1');
      expect(config.tracking.artifact_prefix).toBe('runs');
      expect(config.registry.default_alias).toBe('champion');
      expect(config.model.num_boost_round).toBe(100);
      expect(config.model.eval_metrics).toEqual(['log_loss']);
      expect(config.features.positive_label).toBe('1');
      expect(config.evaluation.thresholds).toEqual({});
      expect(config.evaluation.decision_threshold).toBe(0.5);
      expect(config.evaluation.explain).toEqual({ enable: false, max_features: 10 });
    });

    it('coerces a numeric positive label to a string', () => {
      const config = parsePipelineConfig({
        ...BASE_CONFIG,
        features: { ...BASE_CONFIG.features, positive_label: 1 },
      });
      expect(config.features.positive_label).toBe('1');
    });

    it('accepts bare and directional thresholds', () => {
      const config = parsePipelineConfig({
        ...BASE_CONFIG,
        evaluation: { thresholds: { auc: 0.8, log_loss: { max: 0.5 } } },
      });
      expect(config.evaluation.thresholds).toEqual({ auc: 0.8, log_loss: { max: 0.5 } });
    });

    it('rejects unknown keys', () => {
      expect(() => parsePipelineConfig({ ...BASE_CONFIG, extra: true })).toThrow(ConfigError);
      expect(() =>
        parsePipelineConfig({ ...BASE_CONFIG, model: { ...BASE_CONFIG.model, max_depth: 3 } })
      ).toThrow(/model/);
    });

    it('rejects missing required sections', () => {
      const { features: _features, ...withoutFeatures } = BASE_CONFIG;
      let caught: unknown;
      try {
        parsePipelineConfig(withoutFeatures);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught instanceof ConfigError ? caught.issues : []).toEqual(['features: Required']);
    });

    it('rejects a target column listed among the features', () => {
      expect(() =>
        parsePipelineConfig({
          ...BASE_CONFIG,
          features: { target_column: 'label', training_features: ['score', 'label'] },
        })
      ).toThrow(/target_column must not be listed in training_features/);
    });

    it('rejects an unsupported booster', () => {
      expect(() =>
        parsePipelineConfig({ ...BASE_CONFIG, model: { name: 'm', booster: 'dart' } })
      ).toThrow(ConfigError);
    });
  });

  describe('loadPipelineConfig', () => {
    it('loads a YAML file', () => {
      const configPath = path.join(tmpDir, 'pipeline.yaml');
      fs.writeFileSync(
        configPath,
        [
          'tracking:',
          '  experiment_name: churn',
          '  runs_table: test-runs',
          '  artifact_bucket: test-bucket',
          'registry:',
          '  registry_table: test-registry',
          '  ledger_table: test-ledger',
          'model:',
          '  name: churn_model',
          '  booster: gbtree',
          '  num_boost_round: 20',
          'features:',
          '  target_column: churned',
          '  training_features: [tenure, plan]',
          'evaluation:',
          '  thresholds:',
          '    auc: 0.8',
          '',
        ].join('\n')
      );

      const config = loadPipelineConfig(configPath);
      expect(config.model.booster).toBe('gbtree');
      expect(config.model.num_boost_round).toBe(20);
      expect(config.features.training_features).toEqual(['tenure', 'plan']);
      expect(config.evaluation.thresholds).toEqual({ auc: 0.8 });
    });

    it('fails on a missing file', () => {
      expect(() => loadPipelineConfig(path.join(tmpDir, 'absent.yaml'))).toThrow(/Config file not found/);
    });

    it('fails on an empty path', () => {
      expect(() => loadPipelineConfig('')).toThrow('--config is required');
    });

    it('fails on invalid YAML', () => {
      const configPath = path.join(tmpDir, 'broken.yaml');
      fs.writeFileSync(configPath, 'tracking: [unclosed');
      expect(() => loadPipelineConfig(configPath)).toThrow(/not valid YAML/);
    });
  });

  describe('toHyperparameters', () => {
    it('maps the model section', () => {
      const config = parsePipelineConfig(BASE_CONFIG);
      expect(toHyperparameters(config.model)).toEqual({
        booster: 'gblinear',
        objective: 'binary:logistic',
        eval_metrics: ['log_loss'],
        device: 'cpu',
        num_boost_round: 100,
        learning_rate: 0.1,
        l2_regularization: 1,
        early_stopping_rounds: undefined,
        validation_fraction: 0.2,
        random_seed: 42,
      });
    });
  });

  it('loads the shipped example configuration', () => {
    const config = loadPipelineConfig(path.join(__dirname, '../../../../config/pipeline.example.yaml'));

    expect(config.model.booster).toBe('gbtree');
    expect(config.features.positive_label).toBe('1');
    expect(config.evaluation.thresholds).toEqual({ auc: 0.8, accuracy: { min: 0.85 }, log_loss: { max: 0.45 } });
    expect(config.evaluation.baseline).toEqual({ primary_metric: 'auc', tolerance: 0.01, alias: 'champion' });
  });
});
