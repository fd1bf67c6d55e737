import { Module } from '@nestjs/common';
import { SystemClockAdapter } from './system-clock.adapter';

@Module({
  providers: [{ provide: 'IClock', useClass: SystemClockAdapter }],
  exports: ['IClock'],
})
export class ClockModule {}
