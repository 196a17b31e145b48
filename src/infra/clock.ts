export interface ClockPort {
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }
}

export function nowUnixSeconds(clock: ClockPort): number {
  return Math.floor(Date.parse(clock.nowIso()) / 1000);
}
