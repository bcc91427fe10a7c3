import 'reflect-metadata';
import { readFile } from 'node:fs/promises';
import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNumber,
  IsString,
  ValidateNested,
  validate,
} from 'class-validator';

export class DatasetRowDto {
  @IsArray()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  features!: number[];

  @IsIn([0, 1])
  label!: 0 | 1;
}

/**
 * On-disk training set: named feature columns plus labelled rows
 */
export class DatasetDto {
  @IsString()
  name!: string;

  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  featureNames!: string[];

  @IsArray()
  @ArrayMinSize(2)
  @ValidateNested({ each: true })
  @Type(() => DatasetRowDto)
  rows!: DatasetRowDto[];
}

export interface Dataset {
  name: string;
  featureNames: string[];
  X: number[][];
  y: (0 | 1)[];
}

export class InvalidDatasetError extends Error {
  constructor(source: string, reason: string) {
    super(`Invalid dataset ${source}: ${reason}`);
    this.name = 'InvalidDatasetError';
  }
}

export async function parseDataset(
  raw: unknown,
  source = '<inline>',
): Promise<Dataset> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new InvalidDatasetError(source, 'expected a JSON object');
  }

  const dto = plainToInstance(DatasetDto, raw);
  const errors = await validate(dto);
  if (errors.length > 0) {
    throw new InvalidDatasetError(
      source,
      errors.map((e) => e.toString()).join('').trim(),
    );
  }

  const width = dto.featureNames.length;
  const badRow = dto.rows.findIndex((r) => r.features.length !== width);
  if (badRow !== -1) {
    throw new InvalidDatasetError(
      source,
      `row ${badRow} has ${dto.rows[badRow].features.length} features, expected ${width}`,
    );
  }

  const labels = new Set(dto.rows.map((r) => r.label));
  if (labels.size < 2) {
    throw new InvalidDatasetError(source, 'both classes must be present');
  }

  return {
    name: dto.name,
    featureNames: [...dto.featureNames],
    X: dto.rows.map((r) => [...r.features]),
    y: dto.rows.map((r) => r.label),
  };
}

export async function loadDataset(path: string): Promise<Dataset> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new InvalidDatasetError(path, 'not valid JSON');
  }
  return parseDataset(raw, path);
}
