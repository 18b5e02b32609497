import { ApiProperty } from '@nestjs/swagger';

import { Currency, SUPPORTED_CURRENCIES } from '../../common';
import { AveragedRate } from '../../rates';

export class AveragedRateResponseDto {
  @ApiProperty({ example: 42 })
  id: number;

  @ApiProperty({ enum: [...SUPPORTED_CURRENCIES], example: 'USD' })
  currency: Currency;

  @ApiProperty({ description: 'Average buy rate in UAH', example: 41.27 })
  buyRate: number;

  @ApiProperty({ description: 'Average sell rate in UAH', example: 41.69 })
  sellRate: number;

  @ApiProperty({
    description: 'When the average was written',
    example: '2024-05-10T10:00:00.000Z',
  })
  timestamp: string;

  constructor(rate: AveragedRate) {
    this.id = rate.id;
    this.currency = rate.currency;
    this.buyRate = rate.buyRate;
    this.sellRate = rate.sellRate;
    this.timestamp = rate.timestamp.toISOString();
  }
}
