import {
  AuthenticationError,
  BadRequest,
  BadSymbol,
  BaseError,
  InsufficientFunds,
  InvalidOrder,
  NetworkError,
  OrderNotFound,
  PermissionDenied,
} from 'ccxt';

/** Base class for every failure surfaced by an exchange adapter. */
export class ExchangeError extends Error {
  constructor(
    message: string,
    readonly exchange?: string,
    readonly context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or rate limit. Safe to retry for reads only. */
export class ExchangeTransportError extends ExchangeError {}

/** The exchange refused the request: bad size, insufficient margin, bad symbol. */
export class ExchangeRejectedError extends ExchangeError {}

/** Missing, invalid or under-privileged API credentials. */
export class ExchangeAuthError extends ExchangeError {}

export class OrderNotFoundError extends ExchangeError {}

/** Funding rate or mark price is absent from the exchange response. */
export class MarketDataUnavailableError extends ExchangeError {}

export const isTransportError = (error: unknown): boolean => error instanceof ExchangeTransportError;

/**
 * Maps ccxt's error hierarchy onto the engine's taxonomy. Errors that are
 * already domain errors pass through untouched.
 */
export function translateCcxtError(error: unknown, exchange: string, operation: string): ExchangeError {
  if (error instanceof ExchangeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const context = { operation, original: error instanceof Error ? error.name : typeof error };
  const describe = `${operation} failed on ${exchange}: ${message}`;

  if (error instanceof OrderNotFound) {
    return new OrderNotFoundError(describe, exchange, context);
  }
  if (error instanceof AuthenticationError || error instanceof PermissionDenied) {
    return new ExchangeAuthError(describe, exchange, context);
  }
  if (error instanceof NetworkError) {
    return new ExchangeTransportError(describe, exchange, context);
  }
  if (
    error instanceof InvalidOrder ||
    error instanceof InsufficientFunds ||
    error instanceof BadSymbol ||
    error instanceof BadRequest
  ) {
    return new ExchangeRejectedError(describe, exchange, context);
  }
  if (error instanceof BaseError) {
    return new ExchangeRejectedError(describe, exchange, context);
  }
  return new ExchangeError(describe, exchange, context);
}
