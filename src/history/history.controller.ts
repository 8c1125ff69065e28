import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { PredictionService } from '../prediction/prediction.service';
import { AuthGuard } from '../auth/guards/auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { AuthenticatedUser } from '../auth/interfaces/authenticated-request.interface';
import { HistoryResponse } from '../prediction/types/prediction.types';

@Controller('history')
@ApiTags('History')
export class HistoryController {
  constructor(private readonly predictionService: PredictionService) {}

  @Get()
  @UseGuards(AuthGuard)
  @ApiBearerAuth('bearer')
  @ApiOperation({ summary: 'List your predictions, newest first' })
  @ApiResponse({ status: 200, description: 'Predictions, or a message when there are none' })
  async getHistory(@CurrentUser() user: AuthenticatedUser): Promise<HistoryResponse> {
    return await this.predictionService.getHistory(user.userId);
  }
}
