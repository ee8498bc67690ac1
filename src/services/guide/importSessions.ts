export interface ImportSession {
  groupId: string;
  texts: string[];
  startedAt: number;
}

export type AppendOutcome = 'appended' | 'expired' | 'no-session';

/** Pending text imports keyed by message origin, each with a fixed lifetime. */
export class ImportSessionManager {
  private readonly sessions = new Map<string, ImportSession>();

  constructor(
    readonly timeoutMs: number,
    private readonly now: () => number = Date.now
  ) {}

  start(origin: string, groupId: string): ImportSession {
    const session: ImportSession = { groupId, texts: [], startedAt: this.now() };
    this.sessions.set(origin, session);
    return session;
  }

  has(origin: string): boolean {
    return this.sessions.has(origin);
  }

  append(origin: string, text: string): AppendOutcome {
    const session = this.sessions.get(origin);
    if (!session) {
      return 'no-session';
    }
    if (this.isExpired(session)) {
      this.sessions.delete(origin);
      return 'expired';
    }
    session.texts.push(text);
    return 'appended';
  }

  /** Removes and returns the session. */
  finish(origin: string): ImportSession | null {
    const session = this.sessions.get(origin);
    if (!session) {
      return null;
    }
    this.sessions.delete(origin);
    return session;
  }

  cancel(origin: string): boolean {
    return this.sessions.delete(origin);
  }

  private isExpired(session: ImportSession): boolean {
    return this.now() - session.startedAt > this.timeoutMs;
  }
}
