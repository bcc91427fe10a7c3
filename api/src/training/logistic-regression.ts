export interface LogisticRegressionOptions {
  /** Inverse L2 regularization strength */
  C: number;
  learningRate: number;
  maxIter: number;
}

export const DEFAULT_OPTIONS: LogisticRegressionOptions = {
  C: 1.0,
  learningRate: 0.1,
  maxIter: 1000,
};

/** Serialized form written to the model artifact */
export interface LogisticRegressionModel {
  type: 'logistic_regression';
  classes: [0, 1];
  featureNames: string[];
  weights: number[];
  bias: number;
  means: number[];
  scales: number[];
}

// σ(x)
const sigmoid = (x: number) => 1 / (1 + Math.exp(-x));

function assertMatrix(X: number[][], width?: number): number {
  if (X.length === 0) throw new Error('X must contain at least one row');
  const d = width ?? X[0].length;
  for (const [i, row] of X.entries()) {
    if (row.length !== d) {
      throw new Error(`row ${i} has ${row.length} features, expected ${d}`);
    }
  }
  return d;
}

/**
 * Binary logistic regression fitted by full-batch gradient descent.
 * Features are standardized internally; the stored weights apply to the
 * standardized inputs, so means and scales travel with the model.
 */
export class LogisticRegression {
  private weights: number[] = [];
  private bias = 0;
  private means: number[] = [];
  private scales: number[] = [];
  private featureNames: string[] = [];

  constructor(
    private readonly options: LogisticRegressionOptions = DEFAULT_OPTIONS,
  ) {}

  get fitted(): boolean {
    return this.weights.length > 0;
  }

  get nFeatures(): number {
    return this.weights.length;
  }

  fit(X: number[][], y: (0 | 1)[], featureNames?: string[]): this {
    const d = assertMatrix(X);
    if (y.length !== X.length) {
      throw new Error(`X has ${X.length} rows but y has ${y.length} labels`);
    }
    const n = X.length;

    this.means = Array.from({ length: d }, (_, j) =>
      X.reduce((acc, row) => acc + row[j], 0) / n,
    );
    this.scales = Array.from({ length: d }, (_, j) => {
      const variance =
        X.reduce((acc, row) => acc + (row[j] - this.means[j]) ** 2, 0) / n;
      // constant columns would divide by zero
      return variance > 0 ? Math.sqrt(variance) : 1;
    });
    const Z = X.map((row) => this.standardize(row));

    const { C, learningRate, maxIter } = this.options;
    let w = new Array<number>(d).fill(0);
    let b = 0;

    for (let t = 0; t < maxIter; t++) {
      const gw = new Array<number>(d).fill(0);
      let gb = 0;
      for (let i = 0; i < n; i++) {
        const z = Z[i];
        const e = sigmoid(b + dot(w, z)) - y[i];
        gb += e;
        for (let j = 0; j < d; j++) gw[j] += e * z[j];
      }
      // mean log-loss gradient plus the L2 term (intercept is not penalized)
      w = w.map((wj, j) => wj - learningRate * (gw[j] / n + wj / (C * n)));
      b -= learningRate * (gb / n);
    }

    this.weights = w;
    this.bias = b;
    this.featureNames =
      featureNames ?? Array.from({ length: d }, (_, j) => `x${j}`);
    return this;
  }

  /** P(class = 1) for one sample */
  predictProba(x: number[]): number {
    this.assertFitted();
    if (x.length !== this.nFeatures) {
      throw new Error(
        `expected ${this.nFeatures} features, received ${x.length}`,
      );
    }
    return sigmoid(this.bias + dot(this.weights, this.standardize(x)));
  }

  predict(x: number[]): 0 | 1 {
    return this.predictProba(x) >= 0.5 ? 1 : 0;
  }

  /** Mean accuracy on the given samples */
  score(X: number[][], y: (0 | 1)[]): number {
    assertMatrix(X, this.nFeatures);
    const hits = X.filter((row, i) => this.predict(row) === y[i]).length;
    return hits / X.length;
  }

  toJSON(): LogisticRegressionModel {
    this.assertFitted();
    return {
      type: 'logistic_regression',
      classes: [0, 1],
      featureNames: [...this.featureNames],
      weights: [...this.weights],
      bias: this.bias,
      means: [...this.means],
      scales: [...this.scales],
    };
  }

  static fromJSON(model: unknown): LogisticRegression {
    if (!isModel(model)) {
      throw new Error('not a logistic_regression model artifact');
    }
    const d = model.weights.length;
    if (
      d === 0 ||
      model.means.length !== d ||
      model.scales.length !== d ||
      model.featureNames.length !== d
    ) {
      throw new Error('model artifact has inconsistent dimensions');
    }
    const clf = new LogisticRegression();
    clf.weights = [...model.weights];
    clf.bias = model.bias;
    clf.means = [...model.means];
    clf.scales = [...model.scales];
    clf.featureNames = [...model.featureNames];
    return clf;
  }

  private standardize(x: number[]): number[] {
    return x.map((v, j) => (v - this.means[j]) / this.scales[j]);
  }

  private assertFitted(): void {
    if (!this.fitted) throw new Error('model is not fitted yet');
  }
}

function dot(a: number[], b: number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}

const isNumberArray = (v: unknown): v is number[] =>
  Array.isArray(v) && v.every((n) => typeof n === 'number' && Number.isFinite(n));

function isModel(v: unknown): v is LogisticRegressionModel {
  if (typeof v !== 'object' || v === null) return false;
  const m: Partial<Record<keyof LogisticRegressionModel, unknown>> = v;
  return (
    m.type === 'logistic_regression' &&
    isNumberArray(m.weights) &&
    isNumberArray(m.means) &&
    isNumberArray(m.scales) &&
    typeof m.bias === 'number' &&
    Array.isArray(m.featureNames) &&
    m.featureNames.every((f) => typeof f === 'string')
  );
}
