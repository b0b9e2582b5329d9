import { AnalystSession, type AnalystSessionOptions } from "@/lib/session/analyst-session";

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Sesion no encontrada: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export class SessionStore {
  private readonly sessions = new Map<string, AnalystSession>();

  constructor(private readonly defaults: Omit<AnalystSessionOptions, "id"> = {}) {}

  create(): AnalystSession {
    const session = new AnalystSession(this.defaults);
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): AnalystSession | undefined {
    return this.sessions.get(id);
  }

  require(id: string): AnalystSession {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }
}
