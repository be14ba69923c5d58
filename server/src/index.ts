// ============================================================
// Shape Scatter - Express Server Entry Point
// ============================================================

import { SERVER } from '@shared/constants';
import { CatalogueError, loadCatalogue } from '../../src/catalogue/loader';
import { createApp } from './app';

const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : SERVER.DEFAULT_PORT;
const SHAPES_FILE = process.env.SHAPES_FILE || SERVER.DEFAULT_SHAPES_FILE;

async function main(): Promise<void> {
  const catalogue = await loadCatalogue(SHAPES_FILE);
  const app = createApp({ catalogue });

  app.listen(PORT, () => {
    console.log(`\n  Shape Scatter server running at http://localhost:${PORT}`);
    console.log(`  ${catalogue.size} shape(s) from ${SHAPES_FILE}\n`);
  });
}

main().catch((err: unknown) => {
  if (err instanceof CatalogueError) {
    console.error(`[server] ${err.message}`);
  } else {
    console.error('[server] Failed to start:', err);
  }
  process.exit(1);
});
