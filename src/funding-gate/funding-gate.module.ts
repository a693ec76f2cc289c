import { Module } from '@nestjs/common';
import { FundingGate } from './funding-gate.service';

@Module({
  providers: [FundingGate],
  exports: [FundingGate],
})
export class FundingGateModule {}
