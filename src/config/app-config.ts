import { ExchangeId, PositionMode } from '../exchanges/exchange.interface';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ExchangeSettings {
  apiKey: string;
  secretKey: string;
  passphrase?: string;
  testnet: boolean;
  positionMode: PositionMode;
}

/** Timing and threshold constants of the settlement engine. */
export interface EngineSettings {
  /** Gate check lead before settlement */
  preCheckLeadMs: number;
  /** Opening order lead before settlement */
  actionLeadMs: number;
  /** Action deadline = settlement + grace */
  actionGraceMs: number;
  fundingIntervalHours: number;
  anchorHourUtc: number;
  pollIntervalMs: number;
  openFillTimeoutMs: number;
  /** Close-order monitoring ceiling, counted from close submission */
  monitorCeilingMs: number;
  /** Round-trip fee allowance subtracted from the funding capture */
  feeBuffer: number;
  /** Adverse move against the open price that triggers the stop-loss */
  stopLossThreshold: number;
  stopLossCheckIntervalMs: number;
  /** Arm the stop-loss only once funding has settled */
  armStopLossAtSettlement: boolean;
  readRetryAttempts: number;
  readRetryBackoffMs: number;
  requestTimeoutMs: number;
  timeSyncSamples: number;
}

export interface TradingDefaults {
  threshold: number;
  leverage: number;
  marginAmount?: number;
  quantity?: number;
}

export interface AppConfig {
  port: number;
  environment: string;
  logLevel: LogLevel;

  exchanges: Record<ExchangeId, ExchangeSettings>;
  engine: EngineSettings;
  trading: TradingDefaults;

  recorder: {
    databasePath: string;
  };

  notifications: {
    telegram?: {
      botToken: string;
      chatId: string;
    };
    webhook?: {
      url: string;
      format: 'text' | 'discord';
    };
  };
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  preCheckLeadMs: 15_000,
  actionLeadMs: 5_000,
  actionGraceMs: 30_000,
  fundingIntervalHours: 8,
  anchorHourUtc: 0,
  pollIntervalMs: 200,
  openFillTimeoutMs: 600_000,
  monitorCeilingMs: 600_000,
  feeBuffer: 0.005,
  stopLossThreshold: 0.001,
  stopLossCheckIntervalMs: 1_000,
  armStopLossAtSettlement: true,
  readRetryAttempts: 3,
  readRetryBackoffMs: 250,
  requestTimeoutMs: 8_000,
  timeSyncSamples: 5,
};

export const DEFAULT_THRESHOLD = -0.005;

export type EnvReader = (key: string) => string | undefined;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Builds the configuration from environment variables. Values that do not
 * parse fall back to their default and are reported through `onInvalid`.
 */
export function loadConfig(read: EnvReader, onInvalid: (key: string, value: string) => void = () => undefined): AppConfig {
  const num = (key: string, fallback: number): number => {
    const raw = read(key);
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      onInvalid(key, raw);
      return fallback;
    }
    return parsed;
  };
  const optionalNum = (key: string): number | undefined => {
    const raw = read(key);
    return raw === undefined || raw.trim() === '' ? undefined : num(key, NaN);
  };
  const bool = (key: string, fallback: boolean): boolean => {
    const raw = read(key);
    return raw === undefined || raw === '' ? fallback : raw === 'true' || raw === '1';
  };
  const positionMode = (key: string): PositionMode => (read(key) === 'hedge' ? 'hedge' : 'one-way');
  const exchange = (prefix: string): ExchangeSettings => ({
    apiKey: read(`${prefix}_API_KEY`) ?? '',
    secretKey: read(`${prefix}_SECRET_KEY`) ?? '',
    passphrase: read(`${prefix}_PASSPHRASE`),
    testnet: bool(`${prefix}_TESTNET`, false),
    positionMode: positionMode(`${prefix}_POSITION_MODE`),
  });

  const d = DEFAULT_ENGINE_SETTINGS;
  const logLevel = read('LOG_LEVEL') ?? 'info';
  const marginAmount = optionalNum('DEFAULT_MARGIN');
  const quantity = optionalNum('DEFAULT_QUANTITY');
  const telegramToken = read('TELEGRAM_BOT_TOKEN');
  const webhookUrl = read('WEBHOOK_URL');

  return {
    port: num('PORT', 3000),
    environment: read('NODE_ENV') ?? 'development',
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',

    exchanges: {
      binance: exchange('BINANCE'),
      bybit: exchange('BYBIT'),
      gateio: exchange('GATEIO'),
      bitget: exchange('BITGET'),
    },

    engine: {
      preCheckLeadMs: num('PRE_CHECK_LEAD_MS', d.preCheckLeadMs),
      actionLeadMs: num('ACTION_LEAD_MS', d.actionLeadMs),
      actionGraceMs: num('ACTION_GRACE_MS', d.actionGraceMs),
      fundingIntervalHours: num('FUNDING_INTERVAL_HOURS', d.fundingIntervalHours),
      anchorHourUtc: num('FUNDING_ANCHOR_HOUR_UTC', d.anchorHourUtc),
      pollIntervalMs: num('POLL_INTERVAL_MS', d.pollIntervalMs),
      openFillTimeoutMs: num('OPEN_FILL_TIMEOUT_MS', d.openFillTimeoutMs),
      monitorCeilingMs: num('MONITOR_CEILING_MS', d.monitorCeilingMs),
      feeBuffer: num('FEE_BUFFER', d.feeBuffer),
      stopLossThreshold: num('STOP_LOSS_THRESHOLD', d.stopLossThreshold),
      stopLossCheckIntervalMs: num('STOP_LOSS_CHECK_INTERVAL_MS', d.stopLossCheckIntervalMs),
      armStopLossAtSettlement: bool('ARM_STOP_LOSS_AT_SETTLEMENT', d.armStopLossAtSettlement),
      readRetryAttempts: num('READ_RETRY_ATTEMPTS', d.readRetryAttempts),
      readRetryBackoffMs: num('READ_RETRY_BACKOFF_MS', d.readRetryBackoffMs),
      requestTimeoutMs: num('REQUEST_TIMEOUT_MS', d.requestTimeoutMs),
      timeSyncSamples: num('TIME_SYNC_SAMPLES', d.timeSyncSamples),
    },

    trading: {
      threshold: num('FUNDING_THRESHOLD', DEFAULT_THRESHOLD),
      leverage: num('DEFAULT_LEVERAGE', 5),
      marginAmount: marginAmount !== undefined && Number.isFinite(marginAmount) ? marginAmount : undefined,
      quantity: quantity !== undefined && Number.isFinite(quantity) ? quantity : undefined,
    },

    recorder: {
      databasePath: read('DATABASE_PATH') ?? 'data/trading-records.db',
    },

    notifications: {
      telegram: telegramToken
        ? {
            botToken: telegramToken,
            chatId: read('TELEGRAM_CHAT_ID') ?? '',
          }
        : undefined,
      webhook: webhookUrl
        ? {
            url: webhookUrl,
            format: read('WEBHOOK_FORMAT') === 'discord' ? 'discord' : 'text',
          }
        : undefined,
    },
  };
}
