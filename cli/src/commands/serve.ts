import type http from 'node:http';
import { startServer } from '../../../backend/src/server.js';
import { DEFAULT_PORT } from '../../../backend/src/utils/constants.js';
import { openProject } from '../projectLoader.js';

export interface ServeOptions {
  project?: string;
  port?: string;
  logLevel?: string;
}

export function parsePort(value: string | undefined): number {
  if (value === undefined) return Number(process.env.PORT ?? DEFAULT_PORT);
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535 || String(port) !== value.trim()) {
    throw new Error(`Invalid --port value: "${value}". Must be an integer between 0 and 65535.`);
  }
  return port;
}

export async function serveProject(options: ServeOptions): Promise<http.Server> {
  const port = parsePort(options.port);
  const project = openProject({ project: options.project, logLevel: options.logLevel, console: true });
  const server = await startServer(port, project);
  const shutdown = () => {
    project.stop();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  return server;
}
