// ============================================================
// Shape Scatter - CLI Entry Point
// Loads the catalogue, asks for run parameters, fills the canvas
// until the deadline, writes the PNG and prints the summary.
// ============================================================

import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { SERVER } from '@shared/constants';
import { loadCatalogue } from '../catalogue/loader';
import { normalizeParameters, ScatterSession } from '../engine';
import { SceneRenderer } from '../render/renderer';
import { promptFromTerminal } from './prompt';
import { formatSummary } from './summary';
import { parsePort, serveScene } from './viewer';

const USAGE = `Usage: scatter [--shapes <file>] [--out <file.png>] [--defaults] [--port <n>]

  --shapes    shape catalogue (default ${SERVER.DEFAULT_SHAPES_FILE})
  --out       PNG written after the run (default scatter.png)
  --defaults  skip the prompt and use the default parameters
  --port      port for viewing the scene when not terminating (default ${SERVER.DEFAULT_PORT})`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      shapes: { type: 'string', default: SERVER.DEFAULT_SHAPES_FILE },
      out: { type: 'string', default: 'scatter.png' },
      defaults: { type: 'boolean', default: false },
      port: { type: 'string', default: String(SERVER.DEFAULT_PORT) },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const shapesFile = values.shapes ?? SERVER.DEFAULT_SHAPES_FILE;
  const outFile = values.out ?? 'scatter.png';
  const port = parsePort(values.port ?? String(SERVER.DEFAULT_PORT));

  const catalogue = await loadCatalogue(shapesFile);
  const parameters = values.defaults ? normalizeParameters() : await promptFromTerminal();

  const renderer = new SceneRenderer();
  const session = new ScatterSession({
    catalogue,
    parameters,
    onPlaced: (placement) => renderer.draw(placement),
  });

  console.log(`[scatter] Placing shapes for ${parameters.duration}s (seed ${parameters.seed}, scale ${parameters.scale})`);
  const result = session.run();

  await writeFile(outFile, renderer.toPng());
  console.log(formatSummary(result.startedAt, result.endedAt, result.placements.length));
  console.log(`placed: ${result.placements.length}`);
  console.log(`[scatter] Wrote ${outFile}`);

  if (parameters.terminate) return;

  // Keep the scene on display until interrupted
  const viewer = await serveScene({ catalogue, session, parameters, port });
  console.log(`[scatter] Viewing scene at ${viewer.url}`);
  console.log('[scatter] Press Ctrl+C to exit');
}

main().catch((err: unknown) => {
  if (err instanceof Error) {
    console.error(`[scatter] ${err.message}`);
  } else {
    console.error('[scatter] Run failed:', err);
  }
  process.exit(1);
});
