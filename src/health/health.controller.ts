import { Controller, Get, Logger } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DataSource } from 'typeorm';
import { TaskQueue } from '../jobs/task-queue';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly queue: TaskQueue,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Service health: database reachability and pull queue depth' })
  @ApiResponse({
    status: 200,
    content: {
      'application/json': {
        example: { status: 'ok', database: 'up', queue: { queued: 0, claimed: 3 } },
      },
    },
  })
  async getHealth() {
    try {
      await this.dataSource.query('SELECT 1');
      const queue = await this.queue.counts();
      return { status: 'ok', database: 'up', queue };
    } catch (err) {
      this.logger.warn(`Health check failed: ${err instanceof Error ? err.message : String(err)}`);
      return { status: 'degraded', database: 'down', queue: null };
    }
  }
}
