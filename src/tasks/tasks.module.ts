import { Module } from '@nestjs/common';
import { ExchangesModule } from '../exchanges/exchanges.module';
import { ExecutorModule } from '../executor/executor.module';
import { FundingGateModule } from '../funding-gate/funding-gate.module';
import { NotificationModule } from '../notification/notification.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { FundingCycleService } from './funding-cycle.service';
import { MonitoringTaskService } from './monitoring-task.service';
import { TaskRegistry } from './task-registry.service';

@Module({
  imports: [ExchangesModule, SchedulerModule, FundingGateModule, ExecutorModule, NotificationModule],
  providers: [TaskRegistry, FundingCycleService, MonitoringTaskService],
  exports: [TaskRegistry, MonitoringTaskService],
})
export class TasksModule {}
