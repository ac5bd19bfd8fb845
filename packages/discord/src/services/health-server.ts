import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { errorMessage, logger } from '@banterbot/shared';

export interface BotStatus {
  connected: boolean;
  guilds: number;
  latency?: number;
  activeGames: number;
  trackedChannels: number;
}

export interface StatusResponse extends BotStatus {
  status: 'ok' | 'degraded';
  timestamp: string;
  service: 'banterbot-discord';
  version: string;
  uptime: number;
}

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const file = new URL('../../package.json', import.meta.url);
    return packageSchema.parse(JSON.parse(readFileSync(file, 'utf8'))).version;
  } catch (error) {
    logger.debug(`Could not read package version: ${errorMessage(error)}`);
    return '1.0.0';
  }
}

/**
 * Tiny liveness endpoint for the hosting platform. `/` and `/health` answer
 * "OK" as long as the process is up; `/status` reports what the bot is doing.
 */
export class HealthServer {
  private server: Server | null = null;
  private readonly version = readVersion();

  constructor(
    private readonly port: number,
    private readonly status: () => BotStatus
  ) {}

  start(): Promise<number> {
    const server = createServer((req, res) => this.handle(req, res));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        server.on('error', (error: Error) => logger.error('Health server error:', error));

        const address = server.address();
        const port = address && typeof address === 'object' ? address.port : this.port;
        logger.info(`🩺 Health server running on port ${port}`);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else {
          logger.info('Health server stopped');
          resolve();
        }
      });
    });
  }

  private handle(req: IncomingMessage, res: ServerResponse): void {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.writeHead(405, { 'Content-Type': 'text/plain' });
      res.end('Method not allowed');
      return;
    }

    const path = (req.url ?? '/').split('?')[0];
    try {
      switch (path) {
        case '/':
        case '/health':
          res.writeHead(200, { 'Content-Type': 'text/plain' });
          res.end('OK');
          return;
        case '/status':
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(this.snapshot(), null, 2));
          return;
        default:
          res.writeHead(404, { 'Content-Type': 'text/plain' });
          res.end('Not found');
      }
    } catch (error) {
      logger.error('Health server error:', error);
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Internal server error', message: errorMessage(error) }));
    }
  }

  snapshot(): StatusResponse {
    const bot = this.status();
    return {
      status: bot.connected ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      service: 'banterbot-discord',
      version: this.version,
      uptime: process.uptime(),
      ...bot,
    };
  }
}
