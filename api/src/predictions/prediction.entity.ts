import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

/**
 * One evolving record per observation: the prediction made for it and,
 * once known, its ground-truth label.
 */
@Entity('prediction')
export class Prediction {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'observation_id', unique: true })
  observationId!: number;

  @Column({ type: 'float' })
  proba!: number;

  @Column({ type: 'boolean', name: 'predicted_class' })
  predictedClass!: boolean;

  // Null until a label arrives through /update
  @Column({ type: 'boolean', name: 'true_class', nullable: true })
  trueClass!: boolean | null;
}

/** Flat JSON shape of a stored row. */
export interface PredictionRecord {
  observation_id: number;
  proba: number;
  predicted_class: boolean;
  true_class: boolean | null;
}

export function toPredictionRecord(p: Prediction): PredictionRecord {
  return {
    observation_id: p.observationId,
    proba: p.proba,
    predicted_class: p.predictedClass,
    true_class: p.trueClass ?? null,
  };
}
