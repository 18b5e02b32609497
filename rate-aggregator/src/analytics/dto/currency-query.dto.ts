import { ApiProperty } from '@nestjs/swagger';
import { IsIn } from 'class-validator';

import { Currency, SUPPORTED_CURRENCIES } from '../../common';

export class CurrencyQueryDto {
  @ApiProperty({
    description: 'Currency quoted against UAH',
    enum: [...SUPPORTED_CURRENCIES],
    example: 'USD',
  })
  @IsIn(SUPPORTED_CURRENCIES, {
    message: `Currency must be one of: ${SUPPORTED_CURRENCIES.join(', ')}`,
  })
  currency!: Currency;
}
