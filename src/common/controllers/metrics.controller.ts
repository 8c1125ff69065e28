import { Controller, Get, Res, UseGuards } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { PrometheusController } from '@willsoto/nestjs-prometheus';
import { Response } from 'express';
import { MetricsGuard } from '../guards/metrics.guard';

@ApiExcludeController()
@Controller()
export class MetricsController extends PrometheusController {
  @Get()
  @UseGuards(MetricsGuard)
  async index(@Res({ passthrough: true }) response: Response): Promise<string> {
    return super.index(response);
  }
}
