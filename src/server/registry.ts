/**
 * Sessions of one server, indexed by id and by client address
 */

import { Address } from '../crypto/identity.js';
import { bytesToHex } from '../crypto/utils.js';
import { SessionId } from '../protocol/messages.js';
import { Session } from './session.js';

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly byAddress = new Map<string, string>();

  /**
   * @param idleTimeoutMs - sessions idle longer than this are evicted
   */
  constructor(private readonly idleTimeoutMs: number) {}

  add(session: Session): void {
    const id = session.idHex();
    this.sessions.set(id, session);
    this.byAddress.set(bytesToHex(session.clientAddress), id);
  }

  get(id: SessionId): Session | undefined {
    return this.sessions.get(bytesToHex(id));
  }

  getByAddress(address: Address): Session | undefined {
    const id = this.byAddress.get(bytesToHex(address));
    return id === undefined ? undefined : this.sessions.get(id);
  }

  remove(id: SessionId): Session | undefined {
    const key = bytesToHex(id);
    const session = this.sessions.get(key);
    if (!session) {
      return undefined;
    }
    this.sessions.delete(key);
    const addressKey = bytesToHex(session.clientAddress);
    if (this.byAddress.get(addressKey) === key) {
      this.byAddress.delete(addressKey);
    }
    return session;
  }

  count(): number {
    return this.sessions.size;
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  /**
   * Remove Closed sessions and those idle past the timeout
   */
  evictInactive(now: number = Date.now()): Session[] {
    const evicted: Session[] = [];
    for (const session of this.list()) {
      if (!session.isActive() || now - session.lastActivity() > this.idleTimeoutMs) {
        session.close();
        this.remove(session.id);
        evicted.push(session);
      }
    }
    return evicted;
  }

  closeAll(): void {
    for (const session of this.sessions.values()) {
      session.close();
    }
    this.sessions.clear();
    this.byAddress.clear();
  }
}
