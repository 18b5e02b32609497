import { Controller, Get, HttpCode, HttpStatus, Logger, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { AnalyticsService } from './analytics.service';
import {
  AveragedRateResponseDto,
  CurrencyQueryDto,
  HourlyChangeResponseDto,
  LastHourChangeResponseDto,
  RefreshResponseDto,
} from './dto';
import { RateUpdateScheduler } from '../scheduler';

@ApiTags('Exchange rates')
@Controller('api/exchange')
export class ExchangeRateController {
  private readonly logger = new Logger(ExchangeRateController.name);

  constructor(
    private readonly analyticsService: AnalyticsService,
    private readonly scheduler: RateUpdateScheduler,
  ) {}

  @Get('dynamics/day')
  @ApiOperation({
    summary: 'Hourly dynamics for today',
    description:
      'Percentage change of the averaged buy rate between consecutive records since the start of the current day',
  })
  @ApiResponse({ status: 200, type: [HourlyChangeResponseDto] })
  @ApiResponse({ status: 400, description: 'Invalid currency or fewer than two records today' })
  async getHourlyDynamics(
    @Query() { currency }: CurrencyQueryDto,
  ): Promise<HourlyChangeResponseDto[]> {
    this.logger.log(`Hourly dynamics requested for ${currency}`);
    const dynamics = await this.analyticsService.hourlyDynamics(currency);
    return dynamics.map((change) => new HourlyChangeResponseDto(change));
  }

  @Get('dynamics/hour')
  @ApiOperation({
    summary: 'Change over the last hour',
    description: 'Percentage change between the two most recent averaged buy rates',
  })
  @ApiResponse({ status: 200, type: LastHourChangeResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid currency or fewer than two records' })
  async getLastHourChange(
    @Query() { currency }: CurrencyQueryDto,
  ): Promise<LastHourChangeResponseDto> {
    this.logger.log(`Last hour change requested for ${currency}`);
    return new LastHourChangeResponseDto(
      await this.analyticsService.lastHourChange(currency),
    );
  }

  @Get('last')
  @ApiOperation({ summary: 'Latest averaged rate' })
  @ApiResponse({ status: 200, type: AveragedRateResponseDto })
  @ApiResponse({ status: 404, description: 'No rate recorded for the currency yet' })
  async getLastRate(
    @Query() { currency }: CurrencyQueryDto,
  ): Promise<AveragedRateResponseDto> {
    this.logger.log(`Latest rate requested for ${currency}`);
    return new AveragedRateResponseDto(await this.analyticsService.latest(currency));
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Run a rate update now',
    description: 'Goes through the same no-overlap guard as the periodic run',
  })
  @ApiResponse({ status: 200, type: RefreshResponseDto })
  async refresh(): Promise<RefreshResponseDto> {
    this.logger.log('Manual rate update requested');
    return new RefreshResponseDto(await this.scheduler.trigger());
  }
}
