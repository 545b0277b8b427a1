import { Controller, Get, Query, Redirect } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ShopQueryDto } from '../extensions/dto/extension.dto';
import type { QueryParams } from '../webhooks/signature';
import { AuthService } from './auth.service';

@ApiTags('Auth')
@Controller('api/auth/shopify')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Get('connect')
  @Redirect()
  @ApiOperation({ summary: 'Start the install: redirects to the platform authorize page' })
  @ApiResponse({ status: 302, description: 'Redirect to the authorize URL' })
  async connect(@Query() query: ShopQueryDto) {
    const url = await this.authService.beginInstall(query.shop.toLowerCase());
    return { url, statusCode: 302 };
  }

  @Get('callback')
  @ApiOperation({
    summary: 'OAuth redirect target',
    description: 'Verifies the signed query, exchanges the code, stores the shop and registers webhooks.',
  })
  @ApiResponse({ status: 401, description: 'hmac does not verify' })
  @ApiResponse({ status: 403, description: 'state is unknown, expired or for another shop' })
  @ApiResponse({ status: 502, description: 'Token exchange failed' })
  callback(@Query() query: QueryParams) {
    return this.authService.completeInstall(query);
  }
}
