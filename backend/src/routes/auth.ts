import express from 'express';
import { AuthGuard, SESSION_COOKIE, sessionCookieOptions, sessionToken } from '../middleware/auth';
import { CredentialStore, toPublicUser } from '../utils/credentialStore';
import { ValidationError, sendError } from '../utils/errors';
import { SessionManager } from '../utils/sessionManager';

export interface AuthRouterDeps {
  credentials: CredentialStore;
  sessions: SessionManager;
  guard: AuthGuard;
  cookieMaxAgeMs: number;
}

function readField(body: unknown, field: string): string {
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value.trim() : '';
}

export function createAuthRouter({ credentials, sessions, guard, cookieMaxAgeMs }: AuthRouterDeps) {
  const router = express.Router();

  // Accepts JSON or form-encoded credentials
  router.post('/login', (req, res) => {
    try {
      const username = readField(req.body, 'username');
      const password = readField(req.body, 'password');
      if (!username || !password) {
        throw new ValidationError('Username and password are required');
      }

      const user = credentials.authenticate(username, password);
      const token = sessions.create(user);
      console.log(`[auth] ${user.username} logged in`);

      res.cookie(SESSION_COOKIE, token, sessionCookieOptions(cookieMaxAgeMs));
      res.json({ user: toPublicUser(user) });
    } catch (error) {
      sendError(res, error, 'auth');
    }
  });

  router.post('/logout', (req, res) => {
    const loggedOut = sessions.destroy(sessionToken(req));
    res.clearCookie(SESSION_COOKIE, { path: '/' });
    res.json({ success: true, loggedOut });
  });

  router.get('/user', (req, res) => {
    try {
      const { user } = guard.authenticate(req);
      res.json({ user: toPublicUser(user) });
    } catch (error) {
      sendError(res, error, 'auth');
    }
  });

  return router;
}
