import { ApiProperty } from '@nestjs/swagger';

import { Currency, SUPPORTED_CURRENCIES } from '../../common';
import { LastHourChange } from '../analytics.types';

export class LastHourChangeResponseDto {
  @ApiProperty({ enum: [...SUPPORTED_CURRENCIES], example: 'USD' })
  currency: Currency;

  @ApiProperty({
    description: 'Change between the two most recent averaged buy rates, percent',
    example: -0.37,
  })
  changePercent: number;

  @ApiProperty({ example: 'Dynamic for last hour for USD: -0.37%' })
  description: string;

  constructor(change: LastHourChange) {
    this.currency = change.currency;
    this.changePercent = change.changePercent;
    this.description = change.description;
  }
}
