import express from 'express';
import { AuthGuard } from '../middleware/auth';
import { ValidationError, sendError } from '../utils/errors';
import { SupportAssistant } from '../utils/supportAssistant';

export interface ChatRouterDeps {
  assistant: SupportAssistant;
  guard: AuthGuard;
}

export function createChatRouter({ assistant, guard }: ChatRouterDeps) {
  const router = express.Router();

  router.post('/', async (req, res) => {
    try {
      const { session } = guard.authenticate(req);
      const query: unknown = req.body?.query;
      if (typeof query !== 'string' || query.trim().length === 0) {
        throw new ValidationError('Query is required and must be a non-empty string');
      }

      const result = await assistant.ask(session.token, query);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'chat');
    }
  });

  router.post('/reset', async (req, res) => {
    try {
      const { session } = guard.authenticate(req);
      await assistant.reset(session.token);
      res.json({ success: true, message: 'Chat history reset' });
    } catch (error) {
      sendError(res, error, 'chat');
    }
  });

  router.get('/history', (req, res) => {
    try {
      const { session } = guard.authenticate(req);
      res.json({ transcript: session.transcript });
    } catch (error) {
      sendError(res, error, 'chat');
    }
  });

  return router;
}
