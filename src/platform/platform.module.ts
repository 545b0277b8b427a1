import { Module } from '@nestjs/common';
import { PlatformGateway } from './platform-api';
import { ShopifyGateway } from './shopify.gateway';

@Module({
  providers: [{ provide: PlatformGateway, useClass: ShopifyGateway }],
  exports: [PlatformGateway],
})
export class PlatformModule {}
