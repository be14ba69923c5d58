// ============================================================
// GET /api/progress/:sessionId
// Server-Sent Events endpoint for placements as they land
// ============================================================

import { Router } from 'express';
import { getRun, addListener } from '../session/manager';

const router = Router();

router.get('/:sessionId', (req, res) => {
  const { sessionId } = req.params;
  const run = getRun(sessionId);

  if (!run) {
    return res.status(404).json({ error: 'Session not found' });
  }

  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    'Connection': 'keep-alive',
    'X-Accel-Buffering': 'no', // Disable Nginx buffering
  });

  res.write(`data: ${JSON.stringify({ type: 'connected', sessionId })}\n\n`);

  // A finished run has nothing left to stream
  if (run.status !== 'running') {
    const event =
      run.status === 'complete'
        ? { type: 'complete', sessionId, count: run.session.registry.size, summary: run.summary ?? '' }
        : { type: 'error', sessionId, error: run.error ?? 'Unknown error' };
    res.write(`data: ${JSON.stringify(event)}\n\n`);
    return res.end();
  }

  const removeListener = addListener(sessionId, (event) => {
    res.write(`data: ${JSON.stringify(event)}\n\n`);

    if (event.type === 'complete' || event.type === 'error') {
      removeListener();
      res.end();
    }
  });

  req.on('close', () => {
    removeListener();
  });
});

export default router;
