import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { Prediction } from './prediction.entity';
import { DuplicateObservationError } from './prediction.errors';

export interface NewPrediction {
  observationId: number;
  proba: number;
  predictedClass: boolean;
}

// SQLite (better-sqlite3) and Postgres report unique violations differently
const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', '23505']);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}

/**
 * Create, point lookup and full scan over the prediction table.
 * Uniqueness of observation_id is left to the database constraint.
 */
@Injectable()
export class PredictionStore {
  private readonly logger = new Logger(PredictionStore.name);

  constructor(
    @InjectRepository(Prediction)
    private readonly repo: Repository<Prediction>,
  ) {}

  async create(input: NewPrediction): Promise<Prediction> {
    const row = this.repo.create({ ...input, trueClass: null });
    try {
      await this.repo.insert(row);
      this.logger.debug(
        `Inserted prediction for observation ${input.observationId}`,
      );
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateObservationError(input.observationId);
      }
      throw error;
    }
  }

  findByObservationId(observationId: number): Promise<Prediction | null> {
    return this.repo.findOneBy({ observationId });
  }

  save(prediction: Prediction): Promise<Prediction> {
    return this.repo.save(prediction);
  }

  findAll(): Promise<Prediction[]> {
    return this.repo.find({ order: { id: 'ASC' } });
  }
}
