import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { IngestEventDto } from './dto/ingest-event.dto';
import { EventsService } from './events.service';

@ApiTags('Events')
@Controller('api/data/shopify')
export class EventsController {
  constructor(private readonly eventsService: EventsService) {}

  @Post('event')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Ingest a storefront event',
    description: 'Called by the web pixel. The account id must belong to an active extension.',
  })
  @ApiResponse({
    status: 201,
    content: {
      'application/json': {
        example: { success: true, message: 'Event stored', data: { event_id: 1 } },
      },
    },
  })
  @ApiResponse({ status: 422, description: 'account_id is not mapped to an active extension' })
  @ApiResponse({ status: 429, description: 'Too many events for this account id; see Retry-After' })
  async ingest(@Body() dto: IngestEventDto) {
    const event = await this.eventsService.ingest({
      accountId: dto.account_id,
      eventName: dto.event_name,
      payload: dto.payload,
    });
    return { success: true, message: 'Event stored', data: { event_id: event.id } };
  }
}
