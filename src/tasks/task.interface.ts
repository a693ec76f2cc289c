import { Clock } from '../common/clock';
import { EngineSettings } from '../config/app-config';
import { ExchangeAdapter, ExchangeId, PositionMode } from '../exchanges/exchange.interface';
import { ExecutionResult } from '../executor/executor.interface';
import { FundingDirection, GateDecision } from '../funding-gate/funding-gate.service';

export type OrderSizing = { kind: 'quantity'; quantity: number } | { kind: 'margin'; marginAmount: number };

/** Everything one monitoring task needs, with CLI/API overrides already applied. */
export interface MonitoringTaskSpec {
  exchange: ExchangeId;
  symbol: string;
  threshold: number;
  direction: FundingDirection;
  sizing: OrderSizing;
  leverage: number;
  positionMode?: PositionMode;
  /** Epoch ms the task clock starts at instead of exchange time */
  manualTime?: number;
  /** Keep running across settlements instead of stopping after one cycle */
  loop: boolean;
  engine: EngineSettings;
}

export type CycleStatus = 'executed' | 'skipped' | 'missed' | 'rejected' | 'stopped' | 'failed';

export interface CycleOutcome {
  status: CycleStatus;
  settlementTime: number;
  reason: string;
  decision?: GateDecision;
  execution?: ExecutionResult;
  /** Set when the task cannot continue (bad credentials) */
  fatal?: Error;
}

export interface CycleContext {
  spec: MonitoringTaskSpec;
  adapter: ExchangeAdapter;
  clock: Clock;
  /** Exchange-native symbol */
  symbol: string;
  label: string;
  signal: AbortSignal;
}

export interface TaskResult {
  exchange: ExchangeId;
  symbol: string;
  cycles: CycleOutcome[];
  fatal?: Error;
}

export interface TaskInfo {
  key: string;
  exchange: ExchangeId;
  symbol: string;
  threshold: number;
  loop: boolean;
  startedAt: string;
}
