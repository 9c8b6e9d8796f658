import express from 'express';
import { AuthGuard } from '../middleware/auth';
import { DocumentStore } from '../utils/documentStore';
import { sendError } from '../utils/errors';

export interface DocumentsRouterDeps {
  documents: DocumentStore;
  guard: AuthGuard;
}

export function createDocumentsRouter({ documents, guard }: DocumentsRouterDeps) {
  const router = express.Router();

  // List documents currently in the documents directory
  router.get('/', async (req, res) => {
    try {
      guard.authenticate(req);
      const list = await documents.list();
      res.json({ documents: list, count: list.length });
    } catch (error) {
      sendError(res, error, 'documents');
    }
  });

  // Full text of one document, with an optional highlighted term
  router.get('/:name', async (req, res) => {
    try {
      guard.authenticate(req);
      const term = typeof req.query.highlight === 'string' ? req.query.highlight : undefined;
      res.json(await documents.describe(req.params.name, term));
    } catch (error) {
      sendError(res, error, 'documents');
    }
  });

  return router;
}
