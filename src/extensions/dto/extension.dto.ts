import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsObject, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { SHOP_DOMAIN_REGEX } from '../../common/constants';
import type { JsonObject } from '../../common/json';

export class ShopQueryDto {
  @ApiProperty({ example: 'demo.myshopify.com' })
  @Matches(SHOP_DOMAIN_REGEX, { message: 'shop must be a bare shop domain' })
  shop!: string;
}

export class ActivateExtensionDto extends ShopQueryDto {
  @ApiPropertyOptional({ description: 'Defaults to the token stored at install' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  access_token?: string;

  @ApiPropertyOptional({ description: 'Keep a known account id instead of generating one' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  account_id?: string;
}

export class UpdateExtensionDto extends ShopQueryDto {
  @ApiPropertyOptional({ description: 'Defaults to the token stored at install' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  access_token?: string;

  @ApiProperty({ description: 'Platform id of the web pixel', example: 'gid://shopify/WebPixel/1' })
  @IsString()
  @IsNotEmpty()
  extension_id!: string;

  @ApiPropertyOptional({ type: 'object', additionalProperties: true })
  @IsOptional()
  @IsObject()
  settings?: JsonObject;
}
