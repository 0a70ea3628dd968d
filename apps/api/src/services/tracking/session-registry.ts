import type { TrackingSession } from './tracking-session.js';

/** Live tracking sessions keyed by visit id. */
export class SessionRegistry {
  private readonly sessions = new Map<string, TrackingSession>();
  /** Closed sessions whose background work may still be settling. */
  private readonly draining = new Set<TrackingSession>();

  get(visitId: string): TrackingSession | undefined {
    return this.sessions.get(visitId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Open sessions plus closed ones still settling. */
  get retained(): number {
    return this.sessions.size + this.draining.size;
  }

  /** Registers before opening so a concurrent lookup finds the session. */
  async open(session: TrackingSession): Promise<TrackingSession> {
    const existing = this.sessions.get(session.visitId);
    if (existing) return existing;
    this.sessions.set(session.visitId, session);
    await session.open();
    return session;
  }

  close(visitId: string): boolean {
    const session = this.sessions.get(visitId);
    if (!session) return false;
    this.sessions.delete(visitId);
    session.close();
    this.draining.add(session);
    void session.idle().then(() => {
      this.draining.delete(session);
    });
    return true;
  }

  closeAll(): void {
    for (const visitId of [...this.sessions.keys()]) this.close(visitId);
  }

  async idle(): Promise<void> {
    const all = [...this.sessions.values(), ...this.draining];
    await Promise.all(all.map((s) => s.idle()));
    for (const session of all) this.draining.delete(session);
  }
}
