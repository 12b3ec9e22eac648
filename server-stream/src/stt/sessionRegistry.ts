import crypto from "node:crypto";
import { StreamSession, type SessionSnapshot, type StreamSessionDeps } from "./streamSession.js";

export type SessionDeps = Omit<StreamSessionDeps, "id" | "connectionId">;

export type SessionRegistryOptions = {
  newId?: () => string;
};

/**
 * Live sessions keyed by connection identity. This map is the only state
 * shared between connections; each session's internals are touched only by
 * the handler of the connection that owns it.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, StreamSession>();
  private readonly newId: () => string;

  constructor(opts: SessionRegistryOptions = {}) {
    this.newId = opts.newId ?? (() => crypto.randomUUID());
  }

  create(connectionId: string, deps: SessionDeps): StreamSession {
    if (this.sessions.has(connectionId)) {
      throw new Error(`Session already registered for connection ${connectionId}`);
    }
    const session = new StreamSession({ ...deps, id: this.newId(), connectionId });
    this.sessions.set(connectionId, session);
    return session;
  }

  lookup(connectionId: string): StreamSession | undefined {
    return this.sessions.get(connectionId);
  }

  /** Replaces a finished session so the connection can stream another utterance. */
  renew(connectionId: string, deps: SessionDeps): StreamSession {
    this.sessions.get(connectionId)?.abort();
    this.sessions.delete(connectionId);
    return this.create(connectionId, deps);
  }

  remove(connectionId: string): boolean {
    return this.sessions.delete(connectionId);
  }

  list(): SessionSnapshot[] {
    return Array.from(this.sessions.values(), (session) => session.snapshot());
  }

  get size(): number {
    return this.sessions.size;
  }

  shutdown() {
    for (const session of this.sessions.values()) session.abort();
    this.sessions.clear();
  }
}
