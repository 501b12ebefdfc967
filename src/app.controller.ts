import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AppService, HealthResponse } from './app.service';

@Controller()
@ApiTags('Health')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  @ApiOperation({ summary: 'Liveness with account and session counts' })
  @ApiResponse({ status: 200, description: 'Service is up' })
  getHealth(): HealthResponse {
    return this.appService.getHealth();
  }
}
