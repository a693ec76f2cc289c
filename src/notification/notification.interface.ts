import { ExchangeId } from '../exchanges/exchange.interface';
import { ExecutionOutcome } from '../executor/executor.interface';

export type NotificationKind = ExecutionOutcome | 'skipped' | 'missed' | 'failed';

export interface NotificationEvent {
  kind: NotificationKind;
  exchange: ExchangeId;
  symbol: string;
  message: string;
  details?: Record<string, string | number | undefined>;
}

export interface NotificationChannel {
  readonly name: string;
  send(text: string): Promise<void>;
}

export const NOTIFICATION_CHANNELS = Symbol('NOTIFICATION_CHANNELS');
