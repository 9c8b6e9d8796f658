import { randomBytes } from 'crypto';
import { Session, Turn, User } from '../types';
import { InvalidSession } from './errors';

export const MAX_TRANSCRIPT_TURNS = 20;

export interface SessionManagerOptions {
  idleTimeoutMs?: number;
  maxLifetimeMs?: number;
  maxTranscriptTurns?: number;
  now?: () => number;
}

/**
 * In-memory session table. Sessions die on logout, on idle timeout, at the
 * absolute lifetime, or when the process exits. Expired entries are removed
 * lazily; there is no sweep timer.
 */
export class SessionManager {
  private sessions = new Map<string, Session>();
  private locks = new Map<string, Promise<void>>();
  private readonly idleTimeoutMs: number;
  private readonly maxLifetimeMs: number;
  private readonly maxTranscriptTurns: number;
  private readonly now: () => number;

  constructor(options: SessionManagerOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? 60 * 60 * 1000;
    this.maxLifetimeMs = options.maxLifetimeMs ?? 24 * 60 * 60 * 1000;
    this.maxTranscriptTurns = options.maxTranscriptTurns ?? MAX_TRANSCRIPT_TURNS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(user: User): string {
    this.sweep();
    const token = randomBytes(32).toString('base64url');
    const now = this.now();
    this.sessions.set(token, {
      token,
      username: user.username,
      createdAt: now,
      lastSeenAt: now,
      transcript: []
    });
    return token;
  }

  resolve(token: string | undefined): Session {
    if (!token) {
      throw new InvalidSession('Not logged in');
    }
    const session = this.sessions.get(token);
    if (!session) {
      throw new InvalidSession();
    }
    const now = this.now();
    if (this.isExpired(session, now)) {
      this.sessions.delete(token);
      throw new InvalidSession('Session has expired');
    }
    session.lastSeenAt = now;
    return session;
  }

  appendTurn(token: string, turn: Turn): void {
    const session = this.resolve(token);
    const appended: Turn = { ...turn };
    session.transcript = this.bounded([...session.transcript, Object.freeze(appended)]);
  }

  /**
   * Appends a question and its answer as one step. Expiry is not checked, so
   * a query that outlives the idle timeout still lands in the transcript.
   * Returns false when the session was destroyed in the meantime.
   */
  appendExchange(token: string, question: string, answer: string): boolean {
    const session = this.sessions.get(token);
    if (!session) {
      return false;
    }
    const timestamp = new Date(this.now()).toISOString();
    const asked: Turn = { speaker: 'user', text: question, timestamp };
    const answered: Turn = { speaker: 'assistant', text: answer, timestamp };
    session.transcript = this.bounded([...session.transcript, Object.freeze(asked), Object.freeze(answered)]);
    return true;
  }

  recentTurns(token: string, count: number): Turn[] {
    const { transcript } = this.resolve(token);
    return count > 0 ? transcript.slice(-count) : [];
  }

  reset(token: string): void {
    const session = this.resolve(token);
    session.transcript = [];
  }

  destroy(token: string | undefined): boolean {
    if (!token) {
      return false;
    }
    this.locks.delete(token);
    return this.sessions.delete(token);
  }

  /**
   * Runs task after every earlier task for the same token has settled.
   * Tasks for different tokens do not wait on each other.
   */
  async runExclusive<T>(token: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(token) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(token, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.locks.get(token) === tail) {
        this.locks.delete(token);
      }
    }
  }

  private bounded(transcript: Turn[]): Turn[] {
    return transcript.length > this.maxTranscriptTurns
      ? transcript.slice(-this.maxTranscriptTurns)
      : transcript;
  }

  private isExpired(session: Session, now: number): boolean {
    return now - session.lastSeenAt > this.idleTimeoutMs || now - session.createdAt > this.maxLifetimeMs;
  }

  private sweep(): void {
    const now = this.now();
    for (const [token, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(token);
      }
    }
  }
}
