import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadModel, trainModel } from './trainer';

const datasetPath = join(__dirname, '..', '..', 'data', 'training-set.json');

describe('trainModel', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'trainer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fits every row and writes a loadable artifact', async () => {
    const outputPath = join(dir, 'model.json');
    const result = await trainModel({ datasetPath, outputPath });

    expect(result).toEqual({
      outputPath,
      samples: 48,
      features: 4,
      trainingAccuracy: expect.any(Number),
    });
    expect(result.trainingAccuracy).toBeGreaterThanOrEqual(0.95);

    const model = await loadModel(outputPath);
    expect(model.nFeatures).toBe(4);
    expect(model.predict([8.5, 1.2, 12, 0.4])).toBe(1);
    expect(model.predict([1.5, 6.5, 12, 0.4])).toBe(0);
  });

  it('overwrites the previous artifact on each run', async () => {
    const outputPath = join(dir, 'model.json');
    await writeFile(outputPath, 'stale', 'utf8');

    await trainModel({ datasetPath, outputPath });
    const first = await readFile(outputPath, 'utf8');
    await trainModel({ datasetPath, outputPath });
    const second = await readFile(outputPath, 'utf8');

    expect(second).toBe(first);
    expect(JSON.parse(second)).toMatchObject({
      type: 'logistic_regression',
      classes: [0, 1],
    });
  });

  it('fits with the hyperparameters it is given', async () => {
    const outputPath = join(dir, 'untrained.json');
    const result = await trainModel({
      datasetPath,
      outputPath,
      hyperparameters: { C: 1.0, learningRate: 0.1, maxIter: 0 },
    });

    // no iterations: every sample scores exactly 0.5 and is called class 1
    expect(result.trainingAccuracy).toBe(0.5);
    const artifact = JSON.parse(await readFile(outputPath, 'utf8'));
    expect(artifact.weights).toEqual([0, 0, 0, 0]);
    expect(artifact.bias).toBe(0);
  });

  it('rejects an artifact that is not a model', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, JSON.stringify({ type: 'tree' }), 'utf8');

    await expect(loadModel(path)).rejects.toThrow(
      'not a logistic_regression model artifact',
    );
  });
});
