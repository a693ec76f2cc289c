import { Injectable, Logger } from '@nestjs/common';
import { toPerpetualSymbol } from '../common/helper';
import { ExchangeId } from '../exchanges/exchange.interface';
import { TaskAlreadyRunningError, toError } from './task.errors';
import { TaskInfo, TaskResult } from './task.interface';

export type TaskRunner = (signal: AbortSignal) => Promise<TaskResult>;

export interface RunningTask {
  info: TaskInfo;
  /** Settles with the task result; never rejects */
  done: Promise<TaskResult>;
}

interface Entry extends RunningTask {
  controller: AbortController;
}

export const taskKey = (exchange: ExchangeId, symbol: string): string => `${exchange}:${toPerpetualSymbol(symbol)}`;

/**
 * At most one monitoring task per (exchange, symbol). The membership check and
 * the insert happen in the same synchronous step.
 */
@Injectable()
export class TaskRegistry {
  private readonly logger = new Logger(TaskRegistry.name);
  private readonly tasks = new Map<string, Entry>();

  start(
    task: { exchange: ExchangeId; symbol: string; threshold: number; loop: boolean },
    run: TaskRunner,
  ): RunningTask {
    const key = taskKey(task.exchange, task.symbol);
    if (this.tasks.has(key)) {
      throw new TaskAlreadyRunningError(key);
    }

    const controller = new AbortController();
    const info: TaskInfo = { key, ...task, startedAt: new Date().toISOString() };
    const entry: Entry = {
      info,
      controller,
      done: Promise.resolve()
        .then(() => run(controller.signal))
        .catch((error: unknown): TaskResult => {
          this.logger.error(`💥 Task ${key} crashed: ${String(error)}`);
          return { exchange: task.exchange, symbol: task.symbol, cycles: [], fatal: toError(error) };
        })
        .finally(() => {
          if (this.tasks.get(key) === entry) {
            this.tasks.delete(key);
          }
        }),
    };
    this.tasks.set(key, entry);
    this.logger.log(`▶️ Task ${key} started`);
    return { info, done: entry.done };
  }

  /** Requests a stop; returns false when no such task runs. */
  stop(exchange: ExchangeId, symbol: string): boolean {
    const entry = this.tasks.get(taskKey(exchange, symbol));
    if (!entry) {
      return false;
    }
    this.logger.log(`⏹️ Stopping task ${entry.info.key}`);
    entry.controller.abort();
    return true;
  }

  async stopAll(): Promise<TaskResult[]> {
    const entries = [...this.tasks.values()];
    entries.forEach((entry) => entry.controller.abort());
    return Promise.all(entries.map((entry) => entry.done));
  }

  has(exchange: ExchangeId, symbol: string): boolean {
    return this.tasks.has(taskKey(exchange, symbol));
  }

  list(): TaskInfo[] {
    return [...this.tasks.values()].map((entry) => entry.info);
  }
}
