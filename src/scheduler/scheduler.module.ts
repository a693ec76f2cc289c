import { Module } from '@nestjs/common';
import { FundingScheduler } from './funding-scheduler.service';
import { TimeSyncService } from './time-sync.service';
import { ClockFactory } from './clock.factory';

@Module({
  providers: [FundingScheduler, TimeSyncService, ClockFactory],
  exports: [FundingScheduler, TimeSyncService, ClockFactory],
})
export class SchedulerModule {}
