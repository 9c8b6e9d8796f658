import express from 'express';
import { AuthGuard } from '../middleware/auth';
import { AnalyticsRecorder } from '../utils/analyticsRecorder';
import { CredentialStore } from '../utils/credentialStore';
import { sendError } from '../utils/errors';

export interface AdminRouterDeps {
  analytics: AnalyticsRecorder;
  credentials: CredentialStore;
  guard: AuthGuard;
}

export function createAnalyticsRouter({ analytics, guard }: AdminRouterDeps) {
  const router = express.Router();

  router.get('/', (req, res) => {
    try {
      guard.requireAdmin(req);
      res.json(analytics.aggregate());
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });

  return router;
}

export function createAdminRouter({ credentials, guard }: AdminRouterDeps) {
  const router = express.Router();

  router.get('/users', (req, res) => {
    try {
      guard.requireAdmin(req);
      const users = credentials.listUsers();
      res.json({ users, count: users.length });
    } catch (error) {
      sendError(res, error, 'admin');
    }
  });

  router.post('/users/reload', async (req, res) => {
    try {
      const { user } = guard.requireAdmin(req);
      const count = await credentials.reload();
      console.log(`[admin] ${user.username} reloaded the credential file`);
      res.json({ success: true, count });
    } catch (error) {
      sendError(res, error, 'admin');
    }
  });

  return router;
}
