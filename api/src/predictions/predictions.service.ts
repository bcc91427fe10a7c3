import { Injectable } from '@nestjs/common';
import { PredictionRecord, toPredictionRecord } from './prediction.entity';
import { PredictionNotFoundError } from './prediction.errors';
import { PredictionStore } from './prediction.store';

// Stand-in for a per-request identifier when the caller sends none
export const DEFAULT_OBSERVATION_ID = 0;

// Placeholder score until a trained model is served
export const PLACEHOLDER_PROBA = 0.5;

@Injectable()
export class PredictionsService {
  constructor(private readonly store: PredictionStore) {}

  async submitPrediction(
    observationId: number = DEFAULT_OBSERVATION_ID,
  ): Promise<number> {
    const proba = PLACEHOLDER_PROBA;
    await this.store.create({
      observationId,
      proba,
      predictedClass: proba >= 0.5,
    });
    return proba;
  }

  async submitLabel(
    observationId: number = DEFAULT_OBSERVATION_ID,
    trueClass = false,
  ): Promise<'success'> {
    const prediction = await this.store.findByObservationId(observationId);
    if (!prediction) {
      throw new PredictionNotFoundError(observationId);
    }
    prediction.trueClass = trueClass;
    await this.store.save(prediction);
    return 'success';
  }

  async listRecords(): Promise<PredictionRecord[]> {
    const rows = await this.store.findAll();
    return rows.map(toPredictionRecord);
  }
}
