import { setTimeout as delay } from 'timers/promises';
import type { IClock } from '../../domain/ports/IClock.js';

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number): Promise<void> {
    await delay(ms);
  }
}
