import { randomBytes } from 'crypto';

export type OrderPurpose = 'open' | 'close' | 'stop';

const PREFIX: Record<OrderPurpose, string> = { open: 'o', close: 'c', stop: 's' };

/**
 * Client order id reused across a placement retry so the exchange can tell
 * whether the first attempt landed. Fits the 32/36 character limits of the
 * supported exchanges.
 */
export function newClientOrderId(purpose: OrderPurpose, now: number): string {
  return `fa${PREFIX[purpose]}${now.toString(36)}${randomBytes(4).toString('hex')}`;
}
