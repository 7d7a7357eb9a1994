/**
 * relayHub.ts — Arena of per-room relay channels.
 *
 * Rooms are isolated namespaces: the hub only looks channels up by room id
 * and a channel only ever delivers to its own two slots. The hub holds no
 * lifecycle state of its own; it asks the probe whether a role may be
 * present, and reports vacated slots to whoever subscribed (the lifecycle
 * controller turns those into patient_disconnect / doctor_disconnect).
 */
import type { EndReason, ParticipantRole, SignalFrame } from '../shared';
import type { RelayConnection } from './connection';
import { RoomChannel } from './roomChannel';
import type { AdmitOutcome, ForwardOutcome, PresenceProbe } from './roomChannel';

export type VacatedListener = (roomId: string, role: ParticipantRole) => void;

export class RelayHub {
  private readonly channels = new Map<string, RoomChannel>();
  private readonly vacatedListeners: VacatedListener[] = [];

  constructor(private readonly probe: PresenceProbe) {}

  onVacated(listener: VacatedListener): () => void {
    this.vacatedListeners.push(listener);
    return () => {
      const index = this.vacatedListeners.indexOf(listener);
      if (index >= 0) this.vacatedListeners.splice(index, 1);
    };
  }

  async admit(roomId: string, role: ParticipantRole, conn: RelayConnection): Promise<AdmitOutcome> {
    const channel = this.channelFor(roomId);
    const outcome = await channel.admit(role, conn);
    if (outcome === 'refused') this.disposeIfIdle(channel);
    return outcome;
  }

  send(roomId: string, fromRole: ParticipantRole, connectionId: string, frame: SignalFrame): ForwardOutcome {
    return this.channels.get(roomId)?.forward(fromRole, connectionId, frame) ?? 'not_bound';
  }

  /** Disconnect notification from the transport */
  async evict(roomId: string, role: ParticipantRole, connectionId: string): Promise<boolean> {
    const channel = this.channels.get(roomId);
    if (!channel) return false;
    return channel.release(role, connectionId);
  }

  /** Evict both participants and forget the room */
  async teardown(roomId: string, reason: EndReason | 'cancelled'): Promise<void> {
    const channel = this.channels.get(roomId);
    if (!channel) return;
    this.channels.delete(roomId);
    await channel.teardown({ kind: 'session-ended', reason });
  }

  isBound(roomId: string, role: ParticipantRole): boolean {
    return this.channels.get(roomId)?.isBound(role) ?? false;
  }

  roomCount(): number {
    return this.channels.size;
  }

  private channelFor(roomId: string): RoomChannel {
    let channel = this.channels.get(roomId);
    if (!channel) {
      channel = new RoomChannel(roomId, this.probe, (role) => this.emitVacated(roomId, role));
      this.channels.set(roomId, channel);
    }
    return channel;
  }

  private disposeIfIdle(channel: RoomChannel): void {
    if (this.channels.get(channel.roomId) === channel && channel.tryDispose()) {
      this.channels.delete(channel.roomId);
    }
  }

  private emitVacated(roomId: string, role: ParticipantRole): void {
    for (const listener of [...this.vacatedListeners]) listener(roomId, role);
  }
}
