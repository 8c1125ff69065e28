import {
  Controller,
  Post,
  Get,
  Param,
  UseGuards,
  UseInterceptors,
  UploadedFiles,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBearerAuth,
  ApiConsumes,
  ApiBody,
  ApiParam,
} from '@nestjs/swagger';
import { PredictionService } from './prediction.service';
import { AuthGuard } from '../auth/guards/auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { AuthenticatedUser } from '../auth/interfaces/authenticated-request.interface';
import { PredictionView, PredictResponse, UploadedImages } from './types/prediction.types';

const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

@Controller('predictions')
@ApiTags('Predictions')
@UseGuards(AuthGuard)
@ApiBearerAuth('bearer')
export class PredictionController {
  constructor(private readonly predictionService: PredictionService) {}

  @Post('predict')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(
    FileFieldsInterceptor(
      [
        { name: 'face', maxCount: 1 },
        { name: 'jewelry', maxCount: 1 },
      ],
      { limits: { fileSize: MAX_IMAGE_BYTES } },
    ),
  )
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: ['face', 'jewelry'],
      properties: {
        face: { type: 'string', format: 'binary' },
        jewelry: { type: 'string', format: 'binary' },
      },
    },
  })
  @ApiOperation({ summary: 'Score how well a jewelry item suits a face' })
  @ApiResponse({ status: 200, description: '{ prediction_id, score, category, recommendations }' })
  @ApiResponse({ status: 400, description: 'Uploaded files must be images' })
  @ApiResponse({ status: 500, description: 'Model unavailable or inference failure' })
  async predict(
    @CurrentUser() user: AuthenticatedUser,
    @UploadedFiles() files: UploadedImages | undefined,
  ): Promise<PredictResponse> {
    return await this.predictionService.predict(
      user.userId,
      files?.face?.[0],
      files?.jewelry?.[0],
    );
  }

  @Get('get_prediction/:predictionId')
  @ApiOperation({ summary: 'Get one of your predictions with recommendation images' })
  @ApiParam({ name: 'predictionId', format: 'uuid' })
  @ApiResponse({ status: 200, description: 'Prediction with resolved image URLs' })
  @ApiResponse({ status: 404, description: 'Prediction not found' })
  async getPrediction(
    @CurrentUser() user: AuthenticatedUser,
    @Param('predictionId') predictionId: string,
  ): Promise<PredictionView> {
    return await this.predictionService.getPrediction(user.userId, predictionId);
  }
}
