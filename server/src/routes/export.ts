// ============================================================
// GET /api/export/:sessionId
// Export a scene as JSON, SVG or PNG
// ============================================================

import { Router } from 'express';
import { worldOutline } from '../../../src/engine';
import { renderScenePng } from '../../../src/render/renderer';
import { renderSceneSvg } from '../../../src/render/svg';
import { getRun } from '../session/manager';

const router = Router();

const FORMATS = new Set(['json', 'svg', 'png']);

router.get('/:sessionId', (req, res) => {
  const { sessionId } = req.params;
  const format = typeof req.query.format === 'string' ? req.query.format : 'json';
  const run = getRun(sessionId);

  if (!run) {
    return res.status(404).json({ error: 'Session not found' });
  }
  if (!FORMATS.has(format)) {
    return res.status(400).json({ error: `Unknown format "${format}". Use json, svg or png.` });
  }

  const { config } = run.session;
  const placements = run.session.registry.all();

  if (format === 'svg') {
    res.setHeader('Content-Type', 'image/svg+xml');
    res.setHeader('Content-Disposition', `inline; filename=scatter-${sessionId}.svg`);
    return res.send(renderSceneSvg(placements, config.surface, config.background));
  }

  if (format === 'png') {
    res.setHeader('Content-Type', 'image/png');
    res.setHeader('Content-Disposition', `inline; filename=scatter-${sessionId}.png`);
    return res.send(renderScenePng(placements, config.surface, config.background));
  }

  res.setHeader('Content-Disposition', `attachment; filename=scatter-${sessionId}.json`);
  res.json({
    sessionId: run.id,
    status: run.status,
    exportedAt: new Date().toISOString(),
    parameters: run.parameters,
    surface: config.surface,
    buffer: config.buffer,
    count: placements.length,
    placements: placements.map((p) => ({
      id: p.id,
      shape: p.shape,
      color: p.color,
      anchor: p.anchor,
      scale: p.scale,
      vertices: worldOutline(p.outline, p.anchor, p.scale),
    })),
  });
});

export default router;
