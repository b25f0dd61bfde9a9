import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckService,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { CheckHealthUseCase } from '../../application/use-cases/check-health.use-case';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly checkHealthUseCase: CheckHealthUseCase,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Health check for the customer store' })
  @ApiResponse({ status: 200, description: 'Store ready and data dir writable' })
  @ApiResponse({ status: 503, description: 'Data directory not writable' })
  check() {
    return this.health.check([
      async (): Promise<HealthIndicatorResult> => {
        const status = await this.checkHealthUseCase.execute();
        return {
          'customer-store': { status: 'up', customers: status.customers },
          'data-dir': { status: status.dataDirWritable ? 'up' : 'down' },
        };
      },
    ]);
  }
}
