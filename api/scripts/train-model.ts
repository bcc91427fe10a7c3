/**
 * Offline trainer: fits the classifier on the bundled dataset and writes
 * the artifact, replacing any previous one.
 *
 *   TRAINING_DATA_PATH  dataset JSON (default data/training-set.json)
 *   MODEL_PATH          artifact path (default model.json)
 */
import { Logger } from '@nestjs/common';
import {
  DEFAULT_DATASET_PATH,
  DEFAULT_MODEL_PATH,
  trainModel,
} from '../src/training/trainer';

async function main() {
  const result = await trainModel({
    datasetPath: process.env.TRAINING_DATA_PATH || DEFAULT_DATASET_PATH,
    outputPath: process.env.MODEL_PATH || DEFAULT_MODEL_PATH,
  });
  new Logger('train-model').log(
    `successfully wrote ${result.outputPath} (${result.samples} samples, ${result.features} features)`,
  );
}

main().catch((err: unknown) => {
  new Logger('train-model').error(
    'Training failed',
    err instanceof Error ? err.stack : String(err),
  );
  process.exitCode = 1;
});
