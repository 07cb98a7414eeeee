import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation } from '@nestjs/swagger';
import { HealthService } from './health.service';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Process health' })
  getHealth() {
    return this.healthService.checkHealth();
  }

  @Get('databases')
  @ApiOperation({ summary: 'Connectivity of PostgreSQL, Redis and InfluxDB' })
  async getDatabaseHealth() {
    return await this.healthService.checkDatabaseHealth();
  }
}
