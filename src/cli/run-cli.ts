import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { Command, CommanderError } from 'commander';
import { CliOptionsDto } from '../common/dto/task-options.dto';
import { toNestLogLevels } from '../common/log-level';
import { DEFAULT_THRESHOLD, isLogLevel, LogLevel } from '../config/app-config';
import { AppConfigService } from '../config/config.service';
import { EngineModule } from '../engine.module';
import { ExchangeId } from '../exchanges/exchange.interface';
import { MonitoringTaskService } from '../tasks/monitoring-task.service';
import { TaskRegistry } from '../tasks/task-registry.service';
import { buildTaskSpec } from '../tasks/task-spec';

export type ParsedRun = { kind: 'run'; options: CliOptionsDto } | { kind: 'exit'; code: number; errors: string[] };

type RawOptions = {
  threshold?: number;
  direction?: string;
  quantity?: number;
  margin?: number;
  leverage?: number;
  manualTime?: string;
  logLevel?: string;
  loop?: boolean;
  positionMode?: string;
  feeBuffer?: number;
  stopLoss?: number;
  fillTimeout?: number;
  monitorCeiling?: number;
  pollInterval?: number;
};

const toNumber = (value: string): number => Number(value);

function buildProgram(exchange: ExchangeId, errors: string[]): Command {
  return new Command(`funding-eat-${exchange}`)
    .description(`Collect one ${exchange} funding settlement on a perpetual contract`)
    .argument('<symbol>', 'trading symbol, e.g. BTCUSDT')
    .option('-t, --threshold <rate>', `funding rate threshold (default ${DEFAULT_THRESHOLD} or FUNDING_THRESHOLD)`, toNumber)
    .option('--direction <sign>', 'funding sign to collect: negative | positive')
    .option('-q, --quantity <coins>', 'fixed order quantity', toNumber)
    .option('-m, --margin <usdt>', 'USDT margin; quantity = margin x leverage / mark price', toNumber)
    .option('-l, --leverage <n>', 'leverage', toNumber)
    .option('--manual-time <iso>', 'start the clock at this ISO-8601 instant (testing)')
    .option('--log-level <level>', 'error | warn | info | debug')
    .option('--loop', 'keep running across settlements')
    .option('--position-mode <mode>', 'one-way | hedge')
    .option('--fee-buffer <fraction>', 'round-trip fee allowance', toNumber)
    .option('--stop-loss <fraction>', 'adverse move that triggers the stop-loss', toNumber)
    .option('--fill-timeout <ms>', 'opening order fill timeout', toNumber)
    .option('--monitor-ceiling <ms>', 'close order monitoring ceiling', toNumber)
    .option('--poll-interval <ms>', 'order status poll interval', toNumber)
    .exitOverride()
    .configureOutput({ writeErr: (text) => errors.push(text.trim()) });
}

/** Parses and validates argv (without the node and script entries). */
export function parseRunOptions(exchange: ExchangeId, argv: string[]): ParsedRun {
  const errors: string[] = [];
  const program = buildProgram(exchange, errors);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { kind: 'exit', code: error.exitCode, errors };
    }
    throw error;
  }

  const raw = program.opts<RawOptions>();
  const options = plainToInstance(CliOptionsDto, {
    symbol: program.args[0],
    threshold: raw.threshold,
    direction: raw.direction,
    quantity: raw.quantity,
    margin: raw.margin,
    leverage: raw.leverage,
    manualTime: raw.manualTime,
    logLevel: raw.logLevel,
    loop: raw.loop,
    positionMode: raw.positionMode,
    feeBuffer: raw.feeBuffer,
    stopLoss: raw.stopLoss,
    fillTimeoutMs: raw.fillTimeout,
    monitorCeilingMs: raw.monitorCeiling,
    pollIntervalMs: raw.pollInterval,
  });
  const violations = validateSync(options).flatMap((violation) => Object.values(violation.constraints ?? {}));
  if (violations.length > 0) {
    return { kind: 'exit', code: 1, errors: violations };
  }
  return { kind: 'run', options };
}

/**
 * Runs one monitoring task to completion. Resolves to the process exit code:
 * 0 once the cycle completed (traded or not), 1 on invalid options or an
 * initialisation/credential failure.
 */
export async function runCli(exchange: ExchangeId, argv: string[] = process.argv.slice(2)): Promise<number> {
  const logger = new Logger(`funding-eat-${exchange}`);
  const parsed = parseRunOptions(exchange, argv);
  if (parsed.kind === 'exit') {
    parsed.errors.forEach((message) => logger.error(`❌ ${message}`));
    return parsed.code;
  }

  const { options } = parsed;
  const envLevel = process.env.LOG_LEVEL ?? 'info';
  const level: LogLevel = options.logLevel ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const app = await NestFactory.createApplicationContext(EngineModule, { logger: toNestLogLevels(level) });

  const registry = app.get(TaskRegistry);
  const stop = () => {
    logger.warn('🛑 Stop requested, cancelling outstanding orders');
    void registry.stopAll();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const spec = buildTaskSpec(exchange, options, app.get(AppConfigService));
    const result = await app.get(MonitoringTaskService).start(spec).done;
    return result.fatal ? 1 : 0;
  } catch (error) {
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    await app.close();
  }
}

/** Entry point shared by the per-exchange binaries. */
export function main(exchange: ExchangeId): void {
  void runCli(exchange).then((code) => process.exit(code));
}
