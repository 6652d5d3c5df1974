import type { Response, Request } from 'express';
import { getLogger } from '../logging/logger';
import { sendErrorResponse } from '../error-handling/errors';

const logger = getLogger('sse-manager');

export interface SSEClient {
  id: string;
  res: Response;
  connectedAt: Date;
}

export interface SSEManagerOptions {
  heartbeatMs?: number;
  maxClients?: number;
}

const MAX_BUFFER_SIZE = 65536;

export class SSEManager {
  private clients = new Map<string, SSEClient>();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private readonly heartbeatMs: number;
  private readonly maxClients: number;

  constructor(options: SSEManagerOptions = {}) {
    this.heartbeatMs = options.heartbeatMs ?? 30000;
    this.maxClients = options.maxClients ?? 1000;
  }

  addClient(req: Request, res: Response, clientId: string): SSEClient | null {
    if (this.clients.size >= this.maxClients) {
      sendErrorResponse(res, 503, 'Too many SSE connections');
      return null;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.write(':ok\n\n');

    const client: SSEClient = { id: clientId, res, connectedAt: new Date() };
    this.clients.set(clientId, client);
    this.ensureHeartbeat();

    req.on('close', () => {
      this.clients.delete(clientId);
      logger.debug('SSE client disconnected', { clientId });
    });

    logger.debug('SSE client connected', { clientId, total: this.clients.size });
    return client;
  }

  sendToClient(clientId: string, event: string, data: unknown): boolean {
    const client = this.clients.get(clientId);
    if (!client) return false;

    if (client.res.writableLength > MAX_BUFFER_SIZE) {
      logger.warn('SSE client buffer overloaded, disconnecting', {
        clientId,
        bufferSize: client.res.writableLength,
      });
      this.removeClient(clientId);
      return false;
    }

    try {
      client.res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
      return true;
    } catch (error) {
      logger.debug('SSE write failed, dropping client', { clientId, error: String(error) });
      this.removeClient(clientId);
      return false;
    }
  }

  broadcast(event: string, data: unknown): number {
    let sent = 0;
    for (const client of this.clients.values()) {
      if (this.sendToClient(client.id, event, data)) sent++;
    }
    return sent;
  }

  getClientCount(): number {
    return this.clients.size;
  }

  removeClient(clientId: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;
    this.clients.delete(clientId);
    if (!client.res.writableEnded) client.res.end();
  }

  private ensureHeartbeat(): void {
    if (this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => {
      for (const [id, client] of this.clients) {
        if (client.res.writableLength > MAX_BUFFER_SIZE || client.res.writableEnded) {
          this.removeClient(id);
          continue;
        }
        client.res.write(':heartbeat\n\n');
      }
    }, this.heartbeatMs);
    this.heartbeatTimer.unref();
  }

  shutdown(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    for (const id of [...this.clients.keys()]) {
      this.removeClient(id);
    }
    logger.info('SSE manager shut down');
  }
}
