/**
 * SessionRegistry
 *
 * Holds every in-flight stream of one client so sessions stay alive until
 * they complete, even when the caller drops its handle. Keyed by session id.
 * Callbacks all run on the event loop, so each add/remove is atomic; this is
 * the only state shared between sessions.
 */

import { logger } from "../logging/index.js";

export interface RegisteredSession {
  readonly id: number;
  cancel(): void;
}

export class SessionRegistry {
  private readonly sessions = new Map<number, RegisteredSession>();

  add(session: RegisteredSession): void {
    if (this.sessions.has(session.id)) {
      return;
    }
    this.sessions.set(session.id, session);
    logger.debug(`[SESSION REGISTRY] Added stream ${session.id} (${this.sessions.size} active)`);
  }

  /**
   * Remove by id. Removing an unknown or already-removed session is a no-op.
   * @returns true if the session was registered
   */
  remove(session: RegisteredSession | number): boolean {
    const id = typeof session === "number" ? session : session.id;
    const removed = this.sessions.delete(id);
    if (removed) {
      logger.debug(`[SESSION REGISTRY] Removed stream ${id} (${this.sessions.size} active)`);
    }
    return removed;
  }

  has(session: RegisteredSession | number): boolean {
    return this.sessions.has(typeof session === "number" ? session : session.id);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Cancel every registered session. Sessions remove themselves as they
   * complete; anything still left afterwards is dropped.
   * @returns number of sessions cancelled
   */
  cancelAll(): number {
    const snapshot = [...this.sessions.values()];
    for (const session of snapshot) {
      try {
        session.cancel();
      } catch (error: unknown) {
        logger.error(`[SESSION REGISTRY] Failed to cancel stream ${session.id}:`, error);
      }
    }
    this.sessions.clear();
    return snapshot.length;
  }
}
