// ============================================================
// Shape Scatter - Scene Viewer
// Serves a finished CLI run over HTTP until the process exits.
// ============================================================

import type { Server } from 'node:http';
import type { Catalogue, RunParameters } from '@shared/types';
import type { ScatterSession } from '../engine';
import { createApp } from '../../server/src/app';
import { registerCompletedRun } from '../../server/src/session/manager';

export interface ViewerOptions {
  catalogue: Catalogue;
  session: ScatterSession;
  parameters: RunParameters;
  port: number;
  host?: string;
}

export interface Viewer {
  server: Server;
  /** PNG export of the served run */
  url: string;
}

/** Parses a `--port` value; only whole numbers in 0-65535 are accepted. */
export function parsePort(raw: string): number {
  const trimmed = raw.trim();
  const port = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || port > 65535) {
    throw new Error(`Invalid port "${raw}": expected a whole number from 0 to 65535`);
  }
  return port;
}

/**
 * Registers the run and starts listening. Rejects when the port cannot be
 * bound (EADDRINUSE and the like).
 */
export function serveScene(options: ViewerOptions): Promise<Viewer> {
  const { catalogue, session, parameters, port, host } = options;
  const run = registerCompletedRun(session, parameters);
  const app = createApp({ catalogue });

  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);

    server.once('error', (err: Error) => {
      reject(new Error(`Could not serve the scene on port ${port}: ${err.message}`));
    });
    server.once('listening', () => {
      // Port 0 binds an ephemeral port; report the one actually bound
      const address = server.address();
      const boundPort = address !== null && typeof address === 'object' ? address.port : port;
      resolve({
        server,
        url: `http://${host ?? 'localhost'}:${boundPort}/api/export/${run.id}?format=png`,
      });
    });
  });
}
