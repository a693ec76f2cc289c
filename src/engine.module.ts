import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { TasksModule } from './tasks/tasks.module';

/** Settlement engine without an HTTP surface; the CLI runs on this alone. */
@Module({
  imports: [ConfigModule, TasksModule],
  exports: [TasksModule],
})
export class EngineModule {}
