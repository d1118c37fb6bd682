import { WebSocketServer, WebSocket } from 'ws';
import type { Server, IncomingMessage } from 'http';
import { SubscriberClosedError } from '@trackside/domain';
import type { BatchEnvelope, LinkStatus, Schema, SubscriberHandle } from '@trackside/domain';
import type { DistributionHub } from '../services/distribution/distribution-hub.js';
import { readingsMessage, schemaMeta } from './messages.js';
import type { WsMessage } from './messages.js';

/** Close code sent to a client the hub cut off for falling behind. */
export const CLOSE_TOO_SLOW = 4001;

export interface WsGatewayDeps {
  hub: DistributionHub;
  currentSchema: () => Schema;
}

function send(ws: WebSocket, msg: WsMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(JSON.stringify(msg), (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * WebSocket transport for dashboards. Every connection is its own hub
 * subscriber with its own send loop, so a slow socket only ever delays itself.
 */
export class WsGateway {
  private readonly wss: WebSocketServer;
  private readonly connections = new Map<WebSocket, { handle: SubscriberHandle; stop: AbortController }>();
  private readonly pumps = new Set<Promise<void>>();

  constructor(
    server: Server,
    private readonly deps: WsGatewayDeps,
  ) {
    this.wss = new WebSocketServer({ server, path: '/ws' });
    this.wss.on('connection', (ws, req) => this.attach(ws, req));
    console.log('[ws-gateway] listening on /ws');
  }

  get clientCount(): number {
    return this.connections.size;
  }

  announceSchema(schema: Schema): void {
    this.broadcast({ type: 'schema', data: schemaMeta(schema) });
  }

  announceLink(status: LinkStatus): void {
    this.broadcast({ type: 'link', data: status });
  }

  /** Wait (bounded) for send loops to flush, then close every socket. */
  async close(drainTimeoutMs = 2_000): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, drainTimeoutMs);
    });
    await Promise.race([Promise.allSettled([...this.pumps]), timeout]);
    clearTimeout(timer);

    for (const ws of this.wss.clients) ws.close(1001, 'relay shutting down');
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }

  private attach(ws: WebSocket, req: IncomingMessage): void {
    const label = `ws:${req.socket.remoteAddress ?? 'unknown'}:${req.socket.remotePort ?? 0}`;
    const handle = this.deps.hub.subscribe({ label });
    const stop = new AbortController();
    this.connections.set(ws, { handle, stop });

    const detach = (): void => {
      if (!this.connections.delete(ws)) return;
      stop.abort();
      this.deps.hub.unsubscribe(handle);
    };
    ws.on('close', detach);
    ws.on('error', (err) => {
      console.warn(`[ws-gateway] ${label} error`, err.message);
      detach();
    });

    const pump = this.pump(ws, handle, stop.signal)
      .catch((err) => {
        console.warn(`[ws-gateway] ${label} send loop ended`, err instanceof Error ? err.message : err);
        ws.terminate();
      })
      .finally(() => this.pumps.delete(pump));
    this.pumps.add(pump);
  }

  private async pump(ws: WebSocket, handle: SubscriberHandle, signal: AbortSignal): Promise<void> {
    await send(ws, { type: 'schema', data: schemaMeta(this.deps.currentSchema()) });

    for (;;) {
      let envelope: BatchEnvelope;
      try {
        envelope = await handle.next(signal);
      } catch (err) {
        if (signal.aborted) return;
        if (err instanceof SubscriberClosedError) {
          if (ws.readyState === WebSocket.OPEN) {
            ws.close(handle.closeReason === 'lagging' ? CLOSE_TOO_SLOW : 1001);
          }
          return;
        }
        throw err;
      }
      if (ws.readyState !== WebSocket.OPEN) return;
      await send(ws, readingsMessage(envelope));
    }
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const ws of this.connections.keys()) {
      if (ws.readyState === WebSocket.OPEN) ws.send(payload);
    }
  }
}
