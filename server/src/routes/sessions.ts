// ============================================================
// GET /api/sessions/:sessionId
// Run status and counters
// ============================================================

import { Router } from 'express';
import { getRun } from '../session/manager';

const router = Router();

router.get('/:sessionId', (req, res) => {
  const run = getRun(req.params.sessionId);

  if (!run) {
    return res.status(404).json({ error: 'Session not found' });
  }

  const result = run.session.result();
  res.json({
    sessionId: run.id,
    status: run.status,
    parameters: run.parameters,
    count: result.placements.length,
    attempts: result.attempts,
    rejections: result.rejections,
    summary: run.summary ?? null,
    error: run.error ?? null,
  });
});

export default router;
