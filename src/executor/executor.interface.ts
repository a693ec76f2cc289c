import { ExchangeId, InstrumentInfo, PositionSide } from '../exchanges/exchange.interface';
import { ArbitrageOrderSnapshot } from './arbitrage-order';

export type ExecutorState =
  | 'IDLE'
  | 'OPEN_SUBMITTED'
  | 'OPEN_FILLED'
  | 'CLOSE_SUBMITTED'
  | 'CLOSE_FILLED'
  | 'STOP_TRIGGERED'
  | 'CLOSE_CANCELLED'
  | 'DONE';

export type ExecutionOutcome =
  /** Take-profit order filled */
  | 'closed'
  | 'stopped_out'
  /** Opening order never filled before its deadline */
  | 'unfilled'
  /** Close order cancelled by the exchange; position left open */
  | 'close_cancelled'
  /** Close order cancelled at the monitoring ceiling; position left open */
  | 'monitor_timeout'
  | 'rejected'
  | 'aborted'
  | 'stopped_manually';

export interface ExecutorSettings {
  pollIntervalMs: number;
  openFillTimeoutMs: number;
  monitorCeilingMs: number;
  feeBuffer: number;
  stopLossThreshold: number;
  stopLossCheckIntervalMs: number;
  armStopLossAtSettlement: boolean;
  readRetryAttempts: number;
  readRetryBackoffMs: number;
}

export interface ExecutionPlan {
  symbol: string;
  exchange: ExchangeId;
  side: PositionSide;
  quantity: number;
  leverage: number;
  marginAmount?: number;
  fundingRateAtDecision: number;
  settlementTime: number;
  actionDeadline: number;
  instrument: InstrumentInfo;
}

export interface ExecutionResult {
  outcome: ExecutionOutcome;
  order: ArbitrageOrderSnapshot;
  /** Every state the executor went through, starting at IDLE */
  states: ExecutorState[];
  error?: Error;
}
