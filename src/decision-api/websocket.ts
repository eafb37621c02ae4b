import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { WS_EVENTS } from '@shared/constants';
import type { WsMessage } from '@shared/types';

const HEARTBEAT_MS = 30_000;

let wss: WebSocketServer | null = null;
let heartbeat: NodeJS.Timeout | null = null;

function send(socket: WebSocket, message: WsMessage): void {
  if (socket.readyState === WebSocket.OPEN) {
    socket.send(JSON.stringify(message));
  }
}

export function initWebSocket(server: Server): WebSocketServer {
  wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (socket) => {
    send(socket, {
      event: WS_EVENTS.CONNECTION_ESTABLISHED,
      data: null,
      timestamp: new Date().toISOString(),
    });
  });

  heartbeat = setInterval(() => {
    broadcast(WS_EVENTS.HEARTBEAT, null);
  }, HEARTBEAT_MS);
  heartbeat.unref();

  return wss;
}

export function broadcast(event: WsMessage['event'], data: unknown): void {
  if (!wss) return;
  const message: WsMessage = { event, data, timestamp: new Date().toISOString() };
  for (const client of wss.clients) {
    send(client, message);
  }
}

export function closeWebSocket(): Promise<void> {
  if (heartbeat) clearInterval(heartbeat);
  heartbeat = null;
  const server = wss;
  wss = null;
  if (!server) return Promise.resolve();
  for (const client of server.clients) client.terminate();
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
