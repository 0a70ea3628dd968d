import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import { createLogger } from '../lib/logger.js';
import type {
  BookingRecord,
  EtaEstimate,
  SamplingProfile,
  StreamPublisherPort,
  VisitRecord,
} from '@field-visit/domain';

export type WsMessage =
  | { type: 'visit'; data: VisitRecord }
  | { type: 'booking'; data: BookingRecord }
  | { type: 'eta'; data: EtaEstimate }
  | { type: 'samplingMode'; visitId: string; data: SamplingProfile };

export class WsGateway implements StreamPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    createLogger('ws-gateway').info('listening on /ws');
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishVisit(visit: VisitRecord): Promise<void> {
    this.broadcast({ type: 'visit', data: visit });
  }

  async publishBooking(booking: BookingRecord): Promise<void> {
    this.broadcast({ type: 'booking', data: booking });
  }

  async publishEta(estimate: EtaEstimate): Promise<void> {
    this.broadcast({ type: 'eta', data: estimate });
  }

  async publishSamplingMode(visitId: string, profile: SamplingProfile): Promise<void> {
    this.broadcast({ type: 'samplingMode', visitId, data: profile });
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

/**
 * Forwards to the gateway once the HTTP server exists. Services are built before the server,
 * so they hold this instead of the gateway itself.
 */
export class DeferredStreamPublisher implements StreamPublisherPort {
  private target: StreamPublisherPort | null = null;

  attach(target: StreamPublisherPort): void {
    this.target = target;
  }

  async publishVisit(visit: VisitRecord): Promise<void> {
    await this.target?.publishVisit(visit);
  }

  async publishBooking(booking: BookingRecord): Promise<void> {
    await this.target?.publishBooking(booking);
  }

  async publishEta(estimate: EtaEstimate): Promise<void> {
    await this.target?.publishEta(estimate);
  }

  async publishSamplingMode(visitId: string, profile: SamplingProfile): Promise<void> {
    await this.target?.publishSamplingMode(visitId, profile);
  }
}
