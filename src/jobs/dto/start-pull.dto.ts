import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Max, Min } from 'class-validator';
import {
  DEFAULT_BATCH_SIZE,
  MAX_BATCH_SIZE,
  PULL_MODES,
  PullMode,
  RESOURCE_TYPES,
  ResourceType,
  SHOP_DOMAIN_REGEX,
} from '../../common/constants';

export class StartPullDto {
  @ApiProperty({ example: 'demo.myshopify.com' })
  @Matches(SHOP_DOMAIN_REGEX, { message: 'shop must be a bare shop domain' })
  shop!: string;

  @ApiProperty({ description: 'Admin API access token of the shop' })
  @IsString()
  @IsNotEmpty()
  access_token!: string;

  @ApiPropertyOptional({ enum: PULL_MODES, default: 'paginated' })
  @IsOptional()
  @IsIn(PULL_MODES)
  mode?: PullMode;

  @ApiPropertyOptional({ minimum: 1, maximum: MAX_BATCH_SIZE, default: DEFAULT_BATCH_SIZE })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_BATCH_SIZE)
  batch_size?: number;
}

export class ResourceParamDto {
  @ApiProperty({ enum: RESOURCE_TYPES })
  @IsIn(RESOURCE_TYPES)
  resourceType!: ResourceType;
}

export class ResultsQueryDto {
  @ApiProperty({ enum: RESOURCE_TYPES })
  @IsIn(RESOURCE_TYPES)
  resource_type!: ResourceType;
}
