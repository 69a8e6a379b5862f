import { Module } from '@nestjs/common';
import { AcknowledgementService } from './acknowledgement.service';
import { SafetyGate } from './safety-gate.service';

@Module({
  providers: [SafetyGate, AcknowledgementService],
  exports: [SafetyGate, AcknowledgementService],
})
export class SafetyModule {}
