import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ActivateExtensionDto, ShopQueryDto, UpdateExtensionDto } from './dto/extension.dto';
import { ExtensionsService, ExtensionView } from './extensions.service';

const toResponse = (view: ExtensionView) => ({
  extension_id: view.platformId,
  account_id: view.accountId,
  status: view.status,
  version: view.version,
});

@ApiTags('Extensions')
@Controller('api/auth/shopify')
export class ExtensionsController {
  constructor(private readonly extensionsService: ExtensionsService) {}

  @Post('activate-extension')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Activate the web pixel',
    description:
      'Creates the web pixel with a fresh account id, or re-activates the existing one keeping its account id.',
  })
  @ApiResponse({
    status: 200,
    content: {
      'application/json': {
        example: {
          extension_id: 'gid://shopify/WebPixel/1',
          account_id: '5b0c7e6f2f0a4d1e9c3b8a7d6e5f4a3b',
          status: 'active',
          version: '1',
        },
      },
    },
  })
  @ApiResponse({ status: 404, description: 'Shop is not installed' })
  @ApiResponse({ status: 502, description: 'The platform rejected the pixel' })
  @ApiResponse({ status: 409, description: 'account_id belongs to another shop, or differs from the extension already stored' })
  async activate(@Body() dto: ActivateExtensionDto) {
    const view = await this.extensionsService.activate(
      dto.shop.toLowerCase(),
      dto.access_token,
      dto.account_id,
    );
    return toResponse(view);
  }

  @Post('update-extension')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Update web pixel settings; the account id is kept' })
  async update(@Body() dto: UpdateExtensionDto) {
    const view = await this.extensionsService.update(
      dto.shop.toLowerCase(),
      dto.extension_id,
      dto.settings,
      dto.access_token,
    );
    return toResponse(view);
  }

  @Get('extension-status')
  @ApiOperation({ summary: 'Latest extension of a shop' })
  @ApiResponse({ status: 404, description: 'Shop unknown or no extension yet' })
  async status(@Query() query: ShopQueryDto) {
    return toResponse(await this.extensionsService.status(query.shop.toLowerCase()));
  }
}
