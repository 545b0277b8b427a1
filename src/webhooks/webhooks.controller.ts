import {
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  RawBodyRequest,
  Req,
  UnauthorizedException,
} from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import type { Request } from 'express';
import { WebhooksService } from './webhooks.service';

@ApiExcludeController()
@Controller('webhooks')
export class WebhooksController {
  constructor(private readonly webhooksService: WebhooksService) {}

  /** Every topic arrives here; only a bad signature is answered with an error */
  @Post()
  @HttpCode(HttpStatus.OK)
  async receive(
    @Req() req: RawBodyRequest<Request>,
    @Headers('x-shopify-topic') topic?: string,
    @Headers('x-shopify-shop-domain') shopDomain?: string,
    @Headers('x-shopify-hmac-sha256') signature?: string,
  ) {
    const outcome = await this.webhooksService.dispatch({
      topic,
      shopDomain,
      signature,
      rawBody: req.rawBody,
    });

    if (outcome === 'rejected') {
      throw new UnauthorizedException('Invalid webhook signature');
    }
    return { status: 'webhook received' };
  }
}
