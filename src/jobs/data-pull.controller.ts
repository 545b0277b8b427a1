import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DEFAULT_BATCH_SIZE } from '../common/constants';
import { BulkPullService, PullRequest } from './bulk-pull.service';
import { ResourceParamDto, ResultsQueryDto, StartPullDto } from './dto/start-pull.dto';
import type { JobStatus } from './job.types';
import { TaskStore } from './task-store.service';

function toPullRequest(dto: StartPullDto): PullRequest {
  return {
    shop: dto.shop.toLowerCase(),
    accessToken: dto.access_token,
    mode: dto.mode ?? 'paginated',
    batchSize: dto.batch_size ?? DEFAULT_BATCH_SIZE,
  };
}

function toStatusResponse(status: JobStatus) {
  return {
    job_id: status.jobId,
    kind: status.kind,
    state: status.state,
    shop: status.tenant,
    ...(status.children !== undefined && { children: status.children }),
    ...(status.resourceType !== undefined && { resource_type: status.resourceType }),
    ...(status.itemCount !== undefined && { item_count: status.itemCount }),
    ...(status.error !== undefined && { error: status.error }),
    created_at: status.createdAt,
    updated_at: status.updatedAt,
  };
}

@ApiTags('Data pull')
@Controller('api/data-pull')
export class DataPullController {
  constructor(
    private readonly bulkPullService: BulkPullService,
    private readonly taskStore: TaskStore,
  ) {}

  @Post('start')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Start a full data pull',
    description:
      'Queues one child job per resource type (customers, products, orders) and returns at once. ' +
      'Poll each child through the status endpoint.',
  })
  @ApiResponse({
    status: 202,
    content: {
      'application/json': {
        example: {
          status: 'started',
          job_id: '0f5c6f0e-8f7e-4a53-9d57-5d3c1b0a2e11',
          shop: 'demo.myshopify.com',
          children: {
            customers: '7d1b3a52-3c1e-4f0e-a7a5-0c6de0e0c7a1',
            products: 'a3c9e8a4-1b2d-4a47-b0a4-6c2f0d5f9e22',
            orders: 'c2f7d9e1-5a6b-4c3d-8e9f-0a1b2c3d4e55',
          },
        },
      },
    },
  })
  async start(@Body() dto: StartPullDto) {
    const started = await this.bulkPullService.start(toPullRequest(dto));
    return {
      status: started.status,
      job_id: started.jobId,
      shop: started.shop,
      children: started.children,
    };
  }

  @Post(':resourceType')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiParam({ name: 'resourceType', enum: ['customers', 'products', 'orders'] })
  @ApiOperation({ summary: 'Start a pull of a single resource type' })
  async startSingle(@Param() params: ResourceParamDto, @Body() dto: StartPullDto) {
    const started = await this.bulkPullService.startSingle(params.resourceType, toPullRequest(dto));
    return { status: started.status, job_id: started.jobId, shop: started.shop };
  }

  @Get('status/:jobId')
  @ApiOperation({ summary: 'Job status' })
  @ApiResponse({ status: 404, description: 'Unknown job, or its status has expired' })
  async status(@Param('jobId') jobId: string) {
    const status = await this.taskStore.getStatus(jobId);
    if (!status) {
      throw new NotFoundException(`Job ${jobId} not found or expired`);
    }
    return toStatusResponse(status);
  }

  @Get('results/:shop/:jobId')
  @ApiOperation({
    summary: 'Pulled data',
    description:
      'Returns the pulled records of a finished child job. A bulk-pull job id resolves through its child ' +
      'for the requested resource type.',
  })
  @ApiResponse({ status: 404, description: 'Not ready, failed, or expired; the reason is in `message`' })
  async results(
    @Param('shop') shop: string,
    @Param('jobId') jobId: string,
    @Query() query: ResultsQueryDto,
  ) {
    const lookup = await this.taskStore.resolveResult(shop.toLowerCase(), jobId, query.resource_type);

    switch (lookup.status) {
      case 'ready':
        return { success: true, job_id: lookup.jobId, count: lookup.data.length, data: lookup.data };
      case 'pending':
        throw new NotFoundException(`Job ${lookup.jobId} is still ${lookup.state}`);
      case 'failed':
        throw new NotFoundException(`Job ${lookup.jobId} failed: ${lookup.error}`);
      case 'missing':
        throw new NotFoundException(lookup.reason);
    }
  }
}
