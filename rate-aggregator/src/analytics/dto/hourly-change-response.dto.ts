import { ApiProperty } from '@nestjs/swagger';

import { HourlyChange } from '../analytics.types';

export class HourlyChangeResponseDto {
  @ApiProperty({
    description: 'Timestamp of the later record of the compared pair',
    example: '2024-05-10T10:00:00.000Z',
  })
  timestamp: string;

  @ApiProperty({
    description: 'Change of the averaged buy rate against the previous record, percent',
    example: 1.11,
  })
  changePercent: number;

  @ApiProperty({ example: 'Time: 2024-05-10T10:00:00.000Z, change: 1.11%' })
  description: string;

  constructor(change: HourlyChange) {
    this.timestamp = change.timestamp.toISOString();
    this.changePercent = change.changePercent;
    this.description = change.description;
  }
}
