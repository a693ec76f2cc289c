import { Module } from '@nestjs/common';
import { RecorderModule } from '../recorder/recorder.module';
import { OrderExecutorFactory } from './order-executor.factory';

@Module({
  imports: [RecorderModule],
  providers: [OrderExecutorFactory],
  exports: [OrderExecutorFactory],
})
export class ExecutorModule {}
