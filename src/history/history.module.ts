import { Module } from '@nestjs/common';
import { HistoryController } from './history.controller';
import { PredictionModule } from '../prediction/prediction.module';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [PredictionModule, AuthModule],
  controllers: [HistoryController],
})
export class HistoryModule {}
