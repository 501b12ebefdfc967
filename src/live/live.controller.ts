import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { AddMonitorDto, MonitorTargetDto } from './dto';
import { LiveWatcherService } from './live-watcher.service';

@Controller('monitors')
@ApiTags('Live monitors')
@UseGuards(ApiKeyGuard)
@ApiBearerAuth()
export class LiveController {
  constructor(private readonly liveWatcher: LiveWatcherService) {}

  @Get()
  @ApiOperation({ summary: 'Watcher state and monitored targets' })
  @ApiResponse({ status: 200, description: 'Watcher status' })
  getStatus() {
    return this.liveWatcher.getStatus();
  }

  @Post()
  @HttpCode(201)
  @ApiOperation({ summary: 'Watch a target for live events' })
  @ApiResponse({ status: 201, description: 'Monitor added or updated' })
  addMonitor(@Body() dto: AddMonitorDto) {
    return this.liveWatcher.addMonitor(dto.target, dto.breadth);
  }

  @Delete()
  @ApiOperation({ summary: 'Stop watching a target' })
  @ApiResponse({ status: 200, description: 'Monitor removed' })
  @ApiResponse({ status: 404, description: 'Target is not monitored' })
  removeMonitor(@Body() dto: MonitorTargetDto) {
    if (!this.liveWatcher.removeMonitor(dto.target)) {
      throw new NotFoundException(`${dto.target} is not monitored`);
    }
    return { removed: true, target: dto.target };
  }

  @Post('check')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Check a monitored target now',
    description: 'Runs one live-event check outside the polling schedule.',
  })
  @ApiResponse({ status: 200, description: 'Check result' })
  @ApiResponse({ status: 404, description: 'Target is not monitored' })
  async checkNow(@Body() dto: MonitorTargetDto) {
    const result = await this.liveWatcher.checkNow(dto.target);
    if (!result) {
      throw new NotFoundException(`${dto.target} is not monitored`);
    }
    return result;
  }

  @Post('watcher/start')
  @HttpCode(200)
  @ApiOperation({ summary: 'Start the polling loop' })
  startWatcher() {
    const started = this.liveWatcher.startWatcher();
    return { running: true, started };
  }

  @Post('watcher/stop')
  @HttpCode(200)
  @ApiOperation({ summary: 'Stop the polling loop' })
  async stopWatcher() {
    const stopped = await this.liveWatcher.stopWatcher();
    return { running: false, stopped };
  }
}
