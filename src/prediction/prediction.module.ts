import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PredictionController } from './prediction.controller';
import { PredictionService } from './prediction.service';
import { PredictorService } from './services/predictor.service';
import { JewelryImageService } from './services/jewelry-image.service';
import { Prediction } from './entities/prediction.entity';
import { JewelryImage } from './entities/jewelry-image.entity';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [TypeOrmModule.forFeature([Prediction, JewelryImage]), AuthModule],
  controllers: [PredictionController],
  providers: [PredictionService, PredictorService, JewelryImageService],
  exports: [PredictionService],
})
export class PredictionModule {}
