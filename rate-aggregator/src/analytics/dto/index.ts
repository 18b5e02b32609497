export { AveragedRateResponseDto } from './averaged-rate-response.dto';
export { CurrencyQueryDto } from './currency-query.dto';
export { HourlyChangeResponseDto } from './hourly-change-response.dto';
export { LastHourChangeResponseDto } from './last-hour-change-response.dto';
export { RefreshResponseDto } from './refresh-response.dto';
