export { SystemClockAdapter } from './system-clock.adapter';
export { ClockModule } from './clock.module';
