import { CookieOptions, Request } from 'express';
import { Session, User } from '../types';
import { CredentialStore } from '../utils/credentialStore';
import { Forbidden, InvalidSession } from '../utils/errors';
import { SessionManager } from '../utils/sessionManager';

export const SESSION_COOKIE = 'session_token';

export function sessionCookieOptions(maxAgeMs: number): CookieOptions {
  return { httpOnly: true, sameSite: 'lax', path: '/', maxAge: maxAgeMs };
}

export function sessionToken(req: Request): string | undefined {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const token = cookies[SESSION_COOKIE];
  return typeof token === 'string' && token.length > 0 ? token : undefined;
}

export interface Authenticated {
  session: Session;
  user: User;
}

export class AuthGuard {
  constructor(
    private readonly sessions: SessionManager,
    private readonly credentials: CredentialStore
  ) {}

  /** Resolves the cookie to a live session, or throws InvalidSession. */
  authenticate(req: Request): Authenticated {
    const session = this.sessions.resolve(sessionToken(req));
    const user = this.credentials.find(session.username);
    // removed or deactivated by a registry reload after logging in
    if (!user || !user.isActive) {
      this.sessions.destroy(session.token);
      throw new InvalidSession('Account is no longer available');
    }
    return { session, user };
  }

  requireAdmin(req: Request): Authenticated {
    const auth = this.authenticate(req);
    if (auth.user.role !== 'admin') {
      throw new Forbidden();
    }
    return auth;
  }
}
