import {
  Controller,
  Get,
  HttpCode,
  Inject,
  NotFoundException,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { ACCOUNT_STORE, AccountStore } from '../storage/interfaces';
import { AccountHealthService } from './account-health.service';
import { AuditQueryDto } from './dto';

@Controller('accounts')
@ApiTags('Accounts')
@UseGuards(ApiKeyGuard)
@ApiBearerAuth()
export class AccountsController {
  constructor(
    private readonly accountHealth: AccountHealthService,
    @Inject(ACCOUNT_STORE) private readonly store: AccountStore,
  ) {}

  @Get('health')
  @ApiOperation({
    summary: 'Account health summary',
    description: 'Counts of accounts by state',
  })
  @ApiResponse({ status: 200, description: 'Counts by state' })
  getHealth() {
    return this.accountHealth.getHealthSummary();
  }

  @Get('status')
  @ApiOperation({
    summary: 'Get account status',
    description: 'Returns status of all enrolled accounts',
  })
  @ApiResponse({ status: 200, description: 'Account status' })
  getStatus() {
    return this.accountHealth.getStatus();
  }

  @Get('audit')
  @ApiOperation({ summary: 'Recent audit log entries, newest first' })
  @ApiResponse({ status: 200, description: 'Audit entries' })
  getAudit(@Query() query: AuditQueryDto) {
    return this.store.getAuditLog(query.limit ?? 50);
  }

  @Post(':id/reactivate')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Reactivate an account',
    description:
      'Returns an inactive account to rotation once its session has been renewed.',
  })
  @ApiResponse({ status: 200, description: 'Account reactivated' })
  @ApiResponse({ status: 404, description: 'Unknown or not inactive account' })
  async reactivate(@Param('id') id: string) {
    if (!(await this.accountHealth.reactivate(id))) {
      throw new NotFoundException(`No inactive account with id ${id}`);
    }
    return { id, status: 'active' };
  }
}
