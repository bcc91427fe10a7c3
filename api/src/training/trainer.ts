import { Logger } from '@nestjs/common';
import { readFile, writeFile } from 'node:fs/promises';
import { loadDataset } from './dataset';
import {
  DEFAULT_OPTIONS,
  LogisticRegression,
  LogisticRegressionOptions,
} from './logistic-regression';

export const DEFAULT_DATASET_PATH = 'data/training-set.json';
export const DEFAULT_MODEL_PATH = 'model.json';

export interface TrainOptions {
  datasetPath: string;
  outputPath: string;
  hyperparameters?: LogisticRegressionOptions;
}

export interface TrainResult {
  outputPath: string;
  samples: number;
  features: number;
  trainingAccuracy: number;
}

const logger = new Logger('Trainer');

/**
 * Fits on every row of the dataset and overwrites the artifact at outputPath.
 * No split, no held-out evaluation.
 */
export async function trainModel(opts: TrainOptions): Promise<TrainResult> {
  const dataset = await loadDataset(opts.datasetPath);
  logger.log(
    `Loaded ${dataset.name}: ${dataset.X.length} rows x ${dataset.featureNames.length} features`,
  );

  const clf = new LogisticRegression(opts.hyperparameters ?? DEFAULT_OPTIONS);
  clf.fit(dataset.X, dataset.y, dataset.featureNames);
  const trainingAccuracy = clf.score(dataset.X, dataset.y);

  await writeFile(
    opts.outputPath,
    JSON.stringify(clf.toJSON(), null, 2) + '\n',
    'utf8',
  );
  logger.log(
    `Wrote model to ${opts.outputPath} (training accuracy ${trainingAccuracy.toFixed(3)})`,
  );

  return {
    outputPath: opts.outputPath,
    samples: dataset.X.length,
    features: dataset.featureNames.length,
    trainingAccuracy,
  };
}

export async function loadModel(path: string): Promise<LogisticRegression> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return LogisticRegression.fromJSON(raw);
}
