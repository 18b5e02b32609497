import { ApiProperty } from '@nestjs/swagger';

import { RunOutcome } from '../../scheduler';

const RUN_OUTCOMES: readonly RunOutcome[] = ['completed', 'failed', 'skipped'];

export class RefreshResponseDto {
  @ApiProperty({
    description: '"skipped" when a rate update was already running',
    enum: [...RUN_OUTCOMES],
    example: 'completed',
  })
  outcome: RunOutcome;

  constructor(outcome: RunOutcome) {
    this.outcome = outcome;
  }
}
