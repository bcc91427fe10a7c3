export class DuplicateObservationError extends Error {
  constructor(readonly observationId: number) {
    super(`A prediction for observation ${observationId} already exists`);
    this.name = 'DuplicateObservationError';
  }
}

export class PredictionNotFoundError extends Error {
  constructor(readonly observationId: number) {
    super(`No prediction stored for observation ${observationId}`);
    this.name = 'PredictionNotFoundError';
  }
}
