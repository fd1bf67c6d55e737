import { Injectable } from '@nestjs/common';
import { IClockPort } from '@application/ports';

@Injectable()
export class SystemClockAdapter implements IClockPort {
  now(): Date {
    return new Date();
  }
}
