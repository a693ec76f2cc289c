import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsIn,
  IsISO8601,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { EXCHANGE_IDS, ExchangeId, PositionMode } from '../../exchanges/exchange.interface';
import { FundingDirection } from '../../funding-gate/funding-gate.service';
import { LogLevel } from '../../config/app-config';

/** Per-task options shared by the CLI and the HTTP API. */
export class TaskOptionsDto {
  @ApiProperty({ description: 'Trading symbol (e.g., BTCUSDT)', example: 'BTCUSDT' })
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @ApiPropertyOptional({
    description: 'Funding rate threshold as a fraction; negative collects negative funding',
    example: -0.005,
  })
  @IsOptional()
  @IsNumber()
  @Min(-1)
  @Max(1)
  threshold?: number;

  @ApiPropertyOptional({
    description: 'Funding sign to collect; derived from the threshold sign when omitted',
    enum: ['negative', 'positive'],
  })
  @IsOptional()
  @IsIn(['negative', 'positive'])
  direction?: FundingDirection;

  @ApiPropertyOptional({ description: 'Fixed order quantity in coins', example: 0.01 })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  quantity?: number;

  @ApiPropertyOptional({ description: 'USDT margin; the quantity is derived from leverage and mark price', example: 100 })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  margin?: number;

  @ApiPropertyOptional({ description: 'Leverage (1-125)', example: 5, minimum: 1, maximum: 125 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(125)
  leverage?: number;

  @ApiPropertyOptional({
    description: 'Start the task clock at this instant instead of exchange time (testing)',
    example: '2024-03-10T07:59:30Z',
  })
  @IsOptional()
  @IsISO8601()
  manualTime?: string;

  @ApiPropertyOptional({ description: 'Keep monitoring subsequent settlements', default: false })
  @IsOptional()
  @IsBoolean()
  loop?: boolean;

  @ApiPropertyOptional({ enum: ['one-way', 'hedge'] })
  @IsOptional()
  @IsIn(['one-way', 'hedge'])
  positionMode?: PositionMode;

  @ApiPropertyOptional({ description: 'Round-trip fee allowance', example: 0.005 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(0.1)
  feeBuffer?: number;

  @ApiPropertyOptional({ description: 'Adverse move that triggers the stop-loss', example: 0.001 })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  @Max(0.5)
  stopLoss?: number;

  @ApiPropertyOptional({ description: 'Opening order fill timeout in ms', example: 600000 })
  @IsOptional()
  @IsInt()
  @IsPositive()
  fillTimeoutMs?: number;

  @ApiPropertyOptional({ description: 'Close order monitoring ceiling in ms', example: 600000 })
  @IsOptional()
  @IsInt()
  @IsPositive()
  monitorCeilingMs?: number;

  @ApiPropertyOptional({ description: 'Order status poll interval in ms', example: 200 })
  @IsOptional()
  @IsInt()
  @Min(50)
  pollIntervalMs?: number;
}

export class StartTaskDto extends TaskOptionsDto {
  @ApiProperty({ enum: [...EXCHANGE_IDS], example: 'binance' })
  @IsIn(EXCHANGE_IDS)
  exchange!: ExchangeId;
}

export class CliOptionsDto extends TaskOptionsDto {
  @IsOptional()
  @IsIn(['error', 'warn', 'info', 'debug'])
  logLevel?: LogLevel;
}
