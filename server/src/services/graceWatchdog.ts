/**
 * graceWatchdog.ts — Timers that end abandoned rooms.
 *
 * Two kinds of per-room timer:
 *   - patient_grace:  armed when the patient's connection drops; fires
 *                     expire_grace once the grace window has passed
 *   - doctor_connect: armed on start; fires if the doctor never binds a
 *                     relay connection
 *
 * Timers live in this process only. The periodic sweep re-derives expiry
 * from the stored lastPatientSeenAt and lastDoctorSeenAt, so a room whose
 * timer died with a previous pod still ends.
 */
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type WatchKind = 'patient_grace' | 'doctor_connect';

export type WatchHandler = (roomId: string, kind: WatchKind) => Promise<void>;

export class GraceWatchdog {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(private readonly onFire: WatchHandler) {}

  arm(roomId: string, kind: WatchKind, delayMs: number): void {
    this.cancel(roomId, kind);
    const key = timerKey(roomId, kind);
    const timer = setTimeout(() => {
      this.timers.delete(key);
      this.onFire(roomId, kind).catch((err: unknown) => {
        logger.error('Watchdog handler failed', { roomId, kind, error: errorMessage(err) });
      });
    }, Math.max(0, delayMs));
    timer.unref();
    this.timers.set(key, timer);
  }

  cancel(roomId: string, kind: WatchKind): void {
    const key = timerKey(roomId, kind);
    const timer = this.timers.get(key);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(key);
    }
  }

  /** Drop every timer of a room that reached a terminal state */
  clear(roomId: string): void {
    this.cancel(roomId, 'patient_grace');
    this.cancel(roomId, 'doctor_connect');
  }

  isArmed(roomId: string, kind: WatchKind): boolean {
    return this.timers.has(timerKey(roomId, kind));
  }

  /** Run `sweep` every intervalMs; a sweep still in flight skips the next tick */
  startSweep(intervalMs: number, sweep: () => Promise<unknown>): void {
    this.stopSweep();
    this.sweepTimer = setInterval(() => {
      if (this.sweeping) return;
      this.sweeping = true;
      sweep()
        .catch((err: unknown) => logger.error('Watchdog sweep failed', { error: errorMessage(err) }))
        .finally(() => {
          this.sweeping = false;
        });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  stop(): void {
    this.stopSweep();
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }
}

function timerKey(roomId: string, kind: WatchKind): string {
  return `${roomId}:${kind}`;
}
