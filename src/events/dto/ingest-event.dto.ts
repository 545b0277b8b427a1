import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsObject, IsString, Matches, MaxLength } from 'class-validator';
import { EVENT_NAME_REGEX } from '../../common/constants';
import type { JsonObject } from '../../common/json';

export class IngestEventDto {
  @ApiProperty({ description: 'Account id from the web pixel settings', example: 'acct-1' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  account_id!: string;

  @ApiProperty({ example: 'product_viewed' })
  @Matches(EVENT_NAME_REGEX, { message: 'event_name must be snake_case, at most 64 characters' })
  event_name!: string;

  @ApiProperty({
    type: 'object',
    additionalProperties: true,
    example: { customer: { id: 'gid://shopify/Customer/42' }, data: { title: 'Linen shirt' } },
  })
  @IsObject()
  payload!: JsonObject;
}
