import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Prediction } from './prediction.entity';
import { PredictionStore } from './prediction.store';
import { PredictionsController } from './predictions.controller';
import { PredictionsService } from './predictions.service';

@Module({
  imports: [TypeOrmModule.forFeature([Prediction])],
  controllers: [PredictionsController],
  providers: [PredictionStore, PredictionsService],
})
export class PredictionsModule {}
