import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import { WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import type { ServerToClientMessage } from '@shared/messages';
import { parseConfig } from '../config';
import type { IReportBroadcaster } from './webReporter';

/**
 * The slice of a WebSocket the hub relies on.
 */
export interface HubSocket {
    readonly readyState: number;
    send(data: string): void;
    on(event: 'close', listener: () => void): unknown;
}

/**
 * Connected chart clients of one server. Sockets register on connect and
 * deregister themselves on close.
 */
export class ReportHub implements IReportBroadcaster {
    private readonly clients = new Map<string, HubSocket>();

    get size(): number {
        return this.clients.size;
    }

    add(socket: HubSocket): string {
        const id = randomUUID();
        this.clients.set(id, socket);
        socket.on('close', () => {
            this.clients.delete(id);
        });
        return id;
    }

    broadcast(message: ServerToClientMessage): void {
        const data = JSON.stringify(message);
        this.clients.forEach(client => {
            if (client.readyState === WebSocket.OPEN) {
                client.send(data);
            }
        });
    }
}

const optionsSchema = z.object({
    // 0 binds an ephemeral port.
    port: z.number().int().refine(port => port === 0 || (port > 1000 && port < 65535), {
        message: 'Port must be 0 or between 1000 and 65535 (exclusive)',
    }).default(5000),
});

export type ReportServerOptions = z.input<typeof optionsSchema>;

const pageUrl = new URL('../../static/reporter.html', import.meta.url);

/**
 * Serves the chart page at `/` and streams reports to browsers over `/ws`.
 */
export class ReportServer implements IReportBroadcaster {
    private readonly requestedPort: number;
    private readonly hub = new ReportHub();
    private httpServer: Server | null = null;
    private wss: WebSocketServer | null = null;

    constructor(options: ReportServerOptions = {}) {
        this.requestedPort = parseConfig(optionsSchema, options, 'report server options').port;
    }

    /** The bound port while listening, the configured one otherwise. */
    get port(): number {
        const address = this.httpServer?.address();
        if (address && typeof address === 'object') return address.port;
        return this.requestedPort;
    }

    get url(): string {
        return `http://localhost:${this.port}`;
    }

    get clientCount(): number {
        return this.hub.size;
    }

    async start(): Promise<void> {
        if (this.httpServer) return;
        const page = await readFile(pageUrl, 'utf8');

        const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
            if (req.url === '/' || req.url === '/index.html') {
                res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
                res.end(page);
                return;
            }
            res.writeHead(404, { 'Content-Type': 'text/plain' });
            res.end('Not found');
        });

        // The WebSocket server re-emits HTTP server errors, so it is attached
        // only once listen has succeeded.
        await new Promise<void>((resolve, reject) => {
            httpServer.once('error', reject);
            httpServer.listen(this.requestedPort, () => {
                httpServer.off('error', reject);
                resolve();
            });
        });

        const wss = new WebSocketServer({ server: httpServer, path: '/ws' });
        wss.on('error', error => {
            // eslint-disable-next-line no-console
            console.error('[ReportServer] Server error:', error);
        });
        wss.on('connection', socket => {
            const id = this.hub.add(socket);
            // eslint-disable-next-line no-console
            console.log(`[ReportServer] Client ${id} connected (${this.hub.size} open).`);
        });

        this.httpServer = httpServer;
        this.wss = wss;
        // eslint-disable-next-line no-console
        console.log(`[ReportServer] Listening on ${this.url}`);
    }

    broadcast(message: ServerToClientMessage): void {
        this.hub.broadcast(message);
    }

    async close(): Promise<void> {
        const { httpServer, wss } = this;
        this.httpServer = null;
        this.wss = null;
        if (wss) {
            wss.clients.forEach(client => client.terminate());
            await new Promise<void>((resolve, reject) => wss.close(err => (err ? reject(err) : resolve())));
        }
        if (httpServer) {
            await new Promise<void>((resolve, reject) => httpServer.close(err => (err ? reject(err) : resolve())));
        }
    }
}
