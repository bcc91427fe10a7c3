import { join } from 'node:path';
import { InvalidDatasetError, loadDataset, parseDataset } from './dataset';

describe('parseDataset', () => {
  const valid = {
    name: 'tiny',
    featureNames: ['a', 'b'],
    rows: [
      { features: [1, 2], label: 0 },
      { features: [3, 4], label: 1 },
    ],
  };

  it('splits rows into a feature matrix and labels', async () => {
    await expect(parseDataset(valid)).resolves.toEqual({
      name: 'tiny',
      featureNames: ['a', 'b'],
      X: [
        [1, 2],
        [3, 4],
      ],
      y: [0, 1],
    });
  });

  it('rejects rows whose width differs from featureNames', async () => {
    const raw = {
      ...valid,
      rows: [valid.rows[0], { features: [3], label: 1 }],
    };
    await expect(parseDataset(raw)).rejects.toThrow(
      'Invalid dataset <inline>: row 1 has 1 features, expected 2',
    );
  });

  it('rejects a dataset with a single class', async () => {
    const raw = {
      ...valid,
      rows: [
        { features: [1, 2], label: 1 },
        { features: [3, 4], label: 1 },
      ],
    };
    await expect(parseDataset(raw)).rejects.toThrow(
      'Invalid dataset <inline>: both classes must be present',
    );
  });

  it('rejects labels other than 0 and 1', async () => {
    const raw = {
      ...valid,
      rows: [valid.rows[0], { features: [3, 4], label: 2 }],
    };
    await expect(parseDataset(raw)).rejects.toThrow(InvalidDatasetError);
  });

  it('rejects non-object input', async () => {
    await expect(parseDataset([1, 2, 3])).rejects.toThrow(
      'Invalid dataset <inline>: expected a JSON object',
    );
  });
});

describe('loadDataset', () => {
  it('reads the bundled training set', async () => {
    const dataset = await loadDataset(
      join(__dirname, '..', '..', 'data', 'training-set.json'),
    );

    expect(dataset.name).toBe('sensor-events');
    expect(dataset.featureNames).toEqual([
      'signal_strength',
      'noise_level',
      'duration_s',
      'peak_ratio',
    ]);
    expect(dataset.X).toHaveLength(48);
    expect(new Set(dataset.y)).toEqual(new Set([0, 1]));
  });
});
