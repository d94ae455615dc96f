/**
 * Audit API routes.
 *
 * GET /audit  List audit records (?runId=, ?limit=, ?offset=)
 */

import { Router } from 'express';
import { AuditService } from '../audit/audit-service';

export function createAuditRoutes(auditService: AuditService): Router {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const { runId, limit, offset } = req.query;
      const records = await auditService.query({
        runId: typeof runId === 'string' ? runId : undefined,
        limit: typeof limit === 'string' ? Number.parseInt(limit, 10) || undefined : undefined,
        offset: typeof offset === 'string' ? Number.parseInt(offset, 10) || undefined : undefined,
      });
      res.json({ records });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
