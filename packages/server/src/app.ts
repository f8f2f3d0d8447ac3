import express from 'express';
import { createServer, type IncomingMessage, type Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { ServerConfig } from './config';
import type { Scripting } from './scripting';
import type { UiHost } from './host/uiHost';
import { runCommand } from './commands/runCommand';
import { parseRunRequest } from './validation';
import { createAuthMiddleware, extractToken, validateToken } from './auth';
import { openLocation as defaultOpenLocation } from './scripts/openLocation';
import { errorMessage } from './errors';

export interface ScriptMenuServerOptions {
  config: ServerConfig;
  scripting: Scripting;
  uiHost: UiHost;
  openLocation?: (dir: string) => Promise<void>;
}

export interface ScriptMenuServer {
  app: express.Express;
  server: Server;
  wss: WebSocketServer;
  close(): Promise<void>;
}

/** HTTP status for a failed run, keyed by error type */
const RUN_ERROR_STATUS: Record<string, number> = {
  'unsupported-script-type': 422,
  'script-execution-failed': 500,
};

export function createScriptMenuServer(options: ScriptMenuServerOptions): ScriptMenuServer {
  const { config, scripting, uiHost } = options;
  const openLocation = options.openLocation ?? ((dir: string) => defaultOpenLocation(dir));
  const { tree } = scripting;

  const app = express();
  const server = createServer(app);

  // Security headers
  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    next();
  });

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.use(express.json({ limit: '64kb' }));
  app.use(createAuthMiddleware(config.authToken));

  app.get('/api/commands', (_req, res) => {
    res.json(tree.toView());
  });

  app.post('/api/commands/refresh', async (_req, res) => {
    const summary = await scripting.refresh();
    res.json({ summary, tree: tree.toView() });
  });

  app.post('/api/commands/open-location', async (_req, res) => {
    try {
      await openLocation(tree.root.dir);
      res.json({ ok: true, dir: tree.root.dir });
    } catch (err) {
      console.warn('[server] Could not open scripts location:', errorMessage(err));
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.post('/api/commands/run', async (req, res) => {
    const parsed = parseRunRequest(req.body);
    if ('error' in parsed) {
      res.status(400).json({ ok: false, error: parsed.error });
      return;
    }

    const { path } = parsed.request;
    const leaf = tree.findLeaf(path);
    if (!leaf) {
      res.status(404).json({ ok: false, error: `No command at ${path.join('/')}` });
      return;
    }

    const result = await runCommand(leaf, path, uiHost);
    const status = result.ok ? 200 : RUN_ERROR_STATUS[result.errorType ?? ''] ?? 500;
    res.status(status).json(result);
  });

  // WebSocket server — pushes the menu and script lifecycle to clients
  const wss = new WebSocketServer({ server, path: '/ws' });

  const unsubscribeTree = tree.subscribe(() => {
    uiHost.broadcast({ type: 'command_tree', data: tree.toView() });
  });

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    if (!validateToken(extractToken(req), config.authToken)) {
      console.warn(`[ws] Unauthorized connection attempt from ${req.socket.remoteAddress}`);
      ws.close(1008, 'Unauthorized');
      return;
    }

    console.log('[ws] client connected');
    ws.send(JSON.stringify({ type: 'command_tree', data: tree.toView() }));

    const unsubscribe = uiHost.subscribe((msg) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(msg));
      }
    });

    ws.on('close', () => {
      console.log('[ws] client disconnected');
      unsubscribe();
    });
    ws.on('error', () => unsubscribe());
  });

  async function close(): Promise<void> {
    unsubscribeTree();
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    if (server.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
  }

  return { app, server, wss, close };
}
