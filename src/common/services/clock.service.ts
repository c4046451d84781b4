import { Injectable } from '@nestjs/common';

/** Source of "now"; replaced in tests to pin the time of day. */
@Injectable()
export class ClockService {
  now(): Date {
    return new Date();
  }
}
