/**
 * roomChannel.ts — One room's relay actor.
 *
 * A RoomChannel owns the doctor slot and the patient slot of a single room.
 * Everything that changes a slot (admit, release, teardown) is a message
 * on the channel's mailbox and runs to completion before the next one
 * starts, so the check-then-bind in admit() cannot interleave with a
 * teardown or with a second admit for the same role.
 *
 * Admission re-reads the stored session state (through the probe) inside
 * the mailbox. An HTTP-level "may join" answer can therefore never let a
 * connection into a room that ended in between.
 *
 * Forwarding only reads the slots and is synchronous, so frames from one
 * sender reach the peer in the order they were sent.
 */
import type { ParticipantRole, SignalFrame } from '../shared';
import type { RelayConnection, RelayNotice } from './connection';
import { otherRole } from './connection';

export type PresenceProbe = (roomId: string, role: ParticipantRole) => Promise<boolean>;

export type AdmitOutcome = 'admitted' | 'refused';
export type ForwardOutcome = 'delivered' | 'no_peer' | 'not_bound';

export class RoomChannel {
  private readonly slots = new Map<ParticipantRole, RelayConnection>();
  private mailbox: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  constructor(
    readonly roomId: string,
    private readonly probe: PresenceProbe,
    private readonly onVacated: (role: ParticipantRole) => void,
  ) {}

  private enqueue<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const run = this.mailbox.then(task).finally(() => {
      this.pending -= 1;
    });
    this.mailbox = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  admit(role: ParticipantRole, conn: RelayConnection): Promise<AdmitOutcome> {
    return this.enqueue(async () => {
      if (this.closed) return 'refused';
      if (!(await this.probe(this.roomId, role))) return 'refused';

      const previous = this.slots.get(role);
      this.slots.set(role, conn);

      // A refreshed page takes over the slot instead of waiting on the ghost
      if (previous && previous.id !== conn.id) {
        previous.notify({ kind: 'replaced' });
        previous.close();
      }

      this.slots.get(otherRole(role))?.notify({ kind: 'peer-joined', role });
      return 'admitted';
    });
  }

  /**
   * Unbind `connectionId` from `role`. Returns false when that connection
   * no longer holds the slot (it was replaced or the room was torn down),
   * in which case nothing else happens.
   */
  release(role: ParticipantRole, connectionId: string): Promise<boolean> {
    return this.enqueue(() => {
      if (this.slots.get(role)?.id !== connectionId) return false;

      this.slots.delete(role);
      this.slots.get(otherRole(role))?.notify({ kind: 'peer-left', role });
      this.onVacated(role);
      return true;
    });
  }

  forward(fromRole: ParticipantRole, connectionId: string, frame: SignalFrame): ForwardOutcome {
    if (this.slots.get(fromRole)?.id !== connectionId) return 'not_bound';
    const peer = this.slots.get(otherRole(fromRole));
    if (!peer) return 'no_peer';
    peer.deliver(frame);
    return 'delivered';
  }

  teardown(notice: Extract<RelayNotice, { kind: 'session-ended' }>): Promise<void> {
    return this.enqueue(() => {
      this.closed = true;
      for (const [role, conn] of [...this.slots]) {
        this.slots.delete(role);
        conn.notify(notice);
        conn.close();
      }
    });
  }

  isBound(role: ParticipantRole): boolean {
    return this.slots.has(role);
  }

  /**
   * True when nothing is bound or queued. The hub drops such a channel and
   * marks it closed in the same tick, so no later message can land on it.
   */
  tryDispose(): boolean {
    if (this.pending > 0 || this.slots.size > 0) return false;
    this.closed = true;
    return true;
  }
}
