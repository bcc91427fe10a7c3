import {
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  Logger,
  NotFoundException,
  Post,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { PredictRequestDto, UpdateRequestDto } from './dto/prediction-request.dto';
import { PredictionRecord } from './prediction.entity';
import {
  DuplicateObservationError,
  PredictionNotFoundError,
} from './prediction.errors';
import { PredictionsService } from './predictions.service';

@Controller()
export class PredictionsController {
  private readonly logger = new Logger(PredictionsController.name);

  constructor(private readonly predictions: PredictionsService) {}

  /**
   * POST /predict
   * Body (optional): { observation_id?: number }
   * Returns the predicted probability as plain text.
   */
  @Post('predict')
  @HttpCode(200)
  async predict(
    @Body() body: PredictRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    try {
      const proba = await this.predictions.submitPrediction(
        body.observation_id,
      );
      res.type('text/plain');
      return String(proba);
    } catch (error) {
      throw this.toHttpError('predict', error);
    }
  }

  /**
   * POST /update
   * Body (optional): { observation_id?: number, true_class?: boolean }
   */
  @Post('update')
  @HttpCode(200)
  async update(
    @Body() body: UpdateRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    try {
      const result = await this.predictions.submitLabel(
        body.observation_id,
        body.true_class,
      );
      res.type('text/plain');
      return result;
    } catch (error) {
      throw this.toHttpError('update', error);
    }
  }

  @Get('list-db-contents')
  listDbContents(): Promise<PredictionRecord[]> {
    return this.predictions.listRecords();
  }

  private toHttpError(route: string, error: unknown): unknown {
    if (error instanceof DuplicateObservationError) {
      this.logger.warn(`${route}: ${error.message}`);
      return new ConflictException({
        message: error.message,
        observation_id: error.observationId,
      });
    }
    if (error instanceof PredictionNotFoundError) {
      this.logger.warn(`${route}: ${error.message}`);
      return new NotFoundException({
        message: error.message,
        observation_id: error.observationId,
      });
    }

    // Unexpected: let Nest's default handler answer with a 500
    this.logger.error(
      `${route} failed`,
      error instanceof Error ? error.stack : String(error),
    );
    return error;
  }
}
