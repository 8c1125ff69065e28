import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';

@Controller()
@ApiTags('App')
export class AppController {
  @Get()
  @ApiOperation({ summary: 'Home' })
  home(): { Message: string } {
    return { Message: 'Welcome to Jewelify home page' };
  }

  @Get('health')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: '{ status: "healthy" }' })
  health(): { status: string } {
    return { status: 'healthy' };
  }
}
