import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type { RefreshTaskEntity } from "../../core/entities/refreshTask";
import type {
  ClockPort,
  IdGeneratorPort,
  RandomSourcePort,
  SleeperPort,
  TaskFactoryPort,
} from "../../core/ports/outboundPorts";

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}

export class TimerSleeper implements SleeperPort {
  async sleep(ms: number): Promise<void> {
    await delay(ms);
  }
}

export class MathRandomSource implements RandomSourcePort {
  next(): number {
    return Math.random();
  }
}

/**
 * Task ids are unique per call; idempotency keys repeat within the same UTC hour.
 * Hyphen delimiters because BullMQ job ids cannot contain colons.
 */
export class TaskFactory implements TaskFactoryPort {
  constructor(
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  create(ticker: string): RefreshTaskEntity {
    const now = this.clock.now();
    const hourBucket = now.toISOString().slice(0, 13);
    const normalized = ticker.toUpperCase();
    return {
      id: this.ids.next(),
      ticker: normalized,
      requestedAt: now,
      idempotencyKey: `${normalized}-refresh-${hourBucket}`,
    };
  }
}
