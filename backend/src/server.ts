/** Express + WebSocket server -- project REST API plus a live engine event stream. */

import 'dotenv/config';
import http from 'node:http';
import { pathToFileURL } from 'node:url';
import express from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import type { EngineEvent } from './models/execution.js';
import { createProjectRouter } from './routes/project.js';
import { Project } from './services/project.js';
import { DEFAULT_PORT } from './utils/constants.js';
import { errorMessage } from './utils/errors.js';
import { ProjectLogger, isLogLevel } from './utils/projectLogger.js';

// -- WebSocket Connection Manager --

export class ConnectionManager {
  private connections = new Set<WebSocket>();

  connect(ws: WebSocket): void {
    this.connections.add(ws);
  }

  disconnect(ws: WebSocket): void {
    this.connections.delete(ws);
  }

  get size(): number {
    return this.connections.size;
  }

  async broadcast(event: EngineEvent): Promise<void> {
    const data = JSON.stringify(event);
    for (const ws of this.connections) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      try {
        ws.send(data);
      } catch (err: unknown) {
        console.warn('[pipeflow] WebSocket send failed:', errorMessage(err));
      }
    }
  }
}

// -- Express App --

export function createApp(project: Project): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', project: project.name, running: project.isRunning });
  });

  app.use('/api/project', createProjectRouter({ project }));

  return app;
}

/** Start the HTTP server; engine events are broadcast on /ws/events. */
export function startServer(port: number, project: Project): Promise<http.Server> {
  const app = createApp(project);
  const server = http.createServer(app);
  const wss = new WebSocketServer({ noServer: true });
  const manager = new ConnectionManager();
  project.setSend((event) => manager.broadcast(event));

  server.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '', `http://${request.headers.host}`);
    if (url.pathname !== '/ws/events') {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      manager.connect(ws);
      ws.on('close', () => manager.disconnect(ws));
    });
  });

  return new Promise((resolve) => {
    server.listen(port, () => {
      project.logger.info('Server listening', { port, project: project.name });
      resolve(server);
    });
  });
}

// -- Direct execution (standalone / dev mode) --

const isDirectRun = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  const port = Number(process.env.PORT ?? DEFAULT_PORT);
  const projectDir = process.env.PIPEFLOW_PROJECT_DIR ?? process.cwd();
  const envLevel = process.env.PIPEFLOW_LOG_LEVEL;
  try {
    const logger = ProjectLogger.forProject(projectDir, isLogLevel(envLevel) ? { level: envLevel } : {});
    const project = Project.load(projectDir, { logger });
    startServer(port, project).catch((err: unknown) => {
      console.error('Failed to start server:', errorMessage(err));
      process.exit(1);
    });
  } catch (err: unknown) {
    console.error('Failed to load project:', errorMessage(err));
    process.exit(1);
  }
}
