import { AppConfigService } from '../config/config.service';
import { TaskOptionsDto } from '../common/dto/task-options.dto';
import { ExchangeId } from '../exchanges/exchange.interface';
import { directionFromThreshold } from '../funding-gate/funding-gate.service';
import { InvalidTaskSpecError } from './task.errors';
import { MonitoringTaskSpec, OrderSizing } from './task.interface';

/** Applies per-task options over the configured defaults. */
export function buildTaskSpec(exchange: ExchangeId, options: TaskOptionsDto, config: AppConfigService): MonitoringTaskSpec {
  const trading = config.getTradingConfig();
  const threshold = options.threshold ?? trading.threshold;

  let manualTime: number | undefined;
  if (options.manualTime !== undefined) {
    manualTime = Date.parse(options.manualTime);
    if (Number.isNaN(manualTime)) {
      throw new InvalidTaskSpecError(`Invalid manual time: ${options.manualTime}`);
    }
  }

  return {
    exchange,
    symbol: options.symbol,
    threshold,
    direction: options.direction ?? directionFromThreshold(threshold),
    sizing: resolveSizing(options, trading.quantity, trading.marginAmount),
    leverage: options.leverage ?? trading.leverage,
    positionMode: options.positionMode,
    manualTime,
    loop: options.loop ?? false,
    engine: {
      ...config.getEngineConfig(),
      ...(options.feeBuffer !== undefined && { feeBuffer: options.feeBuffer }),
      ...(options.stopLoss !== undefined && { stopLossThreshold: options.stopLoss }),
      ...(options.fillTimeoutMs !== undefined && { openFillTimeoutMs: options.fillTimeoutMs }),
      ...(options.monitorCeilingMs !== undefined && { monitorCeilingMs: options.monitorCeilingMs }),
      ...(options.pollIntervalMs !== undefined && { pollIntervalMs: options.pollIntervalMs }),
    },
  };
}

function resolveSizing(options: TaskOptionsDto, defaultQuantity?: number, defaultMargin?: number): OrderSizing {
  if (options.quantity !== undefined && options.margin !== undefined) {
    throw new InvalidTaskSpecError('Pass either a quantity or a margin, not both');
  }
  if (options.quantity !== undefined) {
    return { kind: 'quantity', quantity: options.quantity };
  }
  if (options.margin !== undefined) {
    return { kind: 'margin', marginAmount: options.margin };
  }
  if (defaultQuantity !== undefined) {
    return { kind: 'quantity', quantity: defaultQuantity };
  }
  if (defaultMargin !== undefined) {
    return { kind: 'margin', marginAmount: defaultMargin };
  }
  throw new InvalidTaskSpecError('An order quantity or margin is required (flag or DEFAULT_QUANTITY / DEFAULT_MARGIN)');
}
