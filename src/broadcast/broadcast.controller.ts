import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
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
import { RetryQueueService } from '../retry/retry-queue.service';
import { BroadcastService } from './broadcast.service';
import { StartBroadcastDto } from './dto';

@Controller('broadcasts')
@ApiTags('Broadcasts')
@UseGuards(ApiKeyGuard)
@ApiBearerAuth()
export class BroadcastController {
  constructor(
    private readonly broadcastService: BroadcastService,
    private readonly retryQueue: RetryQueueService,
  ) {}

  @Post()
  @HttpCode(200)
  @ApiOperation({
    summary: 'Start a broadcast',
    description:
      'Runs one operation on the target with up to `breadth` eligible accounts and returns once every account has finished.',
  })
  @ApiResponse({ status: 200, description: 'Broadcast result' })
  @ApiResponse({ status: 400, description: 'Invalid target, operation or payload' })
  @ApiResponse({ status: 401, description: 'Unauthorized - invalid API key' })
  @ApiResponse({
    status: 422,
    description: 'Broadcast aborted because the target is not reachable',
  })
  async start(@Body() dto: StartBroadcastDto) {
    const result = await this.broadcastService.startBroadcast(dto);
    if (result.aborted) {
      // the result still goes back as the body
      throw new HttpException(result, HttpStatus.UNPROCESSABLE_ENTITY);
    }
    return result;
  }

  @Get('retries')
  @ApiOperation({ summary: 'Retry queue status' })
  @ApiResponse({ status: 200, description: 'Workers, queue sizes and halted accounts' })
  getRetries() {
    return this.retryQueue.getStatus();
  }
}
