import { afterEach, describe, expect, it, vi } from 'vitest';
import { WebSocket } from 'ws';
import type { ReportMessage } from '@shared/messages';
import { ConfigurationError } from '../src/errors';
import { ReportHub, ReportServer } from '../src/reporters/reportServer';
import type { HubSocket } from '../src/reporters/reportServer';

class FakeSocket implements HubSocket {
  sent: string[] = [];
  private closeListeners: Array<() => void> = [];

  constructor(public readyState: number = WebSocket.OPEN) {}

  send(data: string): void {
    this.sent.push(data);
  }

  on(_event: 'close', listener: () => void): this {
    this.closeListeners.push(listener);
    return this;
  }

  close(): void {
    this.readyState = WebSocket.CLOSED;
    this.closeListeners.forEach(listener => listener());
  }
}

const message: ReportMessage = {
  type: 'report',
  step: 10,
  time: 0.02,
  values: [{ label: 'Temperature [K]', value: 300 }],
};

describe('ReportHub', () => {
  it('sends each report as JSON to open sockets only', () => {
    const hub = new ReportHub();
    const open = new FakeSocket();
    const connecting = new FakeSocket(WebSocket.CONNECTING);
    hub.add(open);
    hub.add(connecting);

    hub.broadcast(message);
    expect(open.sent).toEqual([
      '{"type":"report","step":10,"time":0.02,"values":[{"label":"Temperature [K]","value":300}]}',
    ]);
    expect(connecting.sent).toEqual([]);
  });

  it('forgets sockets once they close', () => {
    const hub = new ReportHub();
    const first = new FakeSocket();
    const second = new FakeSocket();
    const firstId = hub.add(first);
    const secondId = hub.add(second);
    expect(firstId).not.toBe(secondId);
    expect(hub.size).toBe(2);

    first.close();
    expect(hub.size).toBe(1);
    hub.broadcast(message);
    expect(first.sent).toEqual([]);
    expect(second.sent).toHaveLength(1);
  });

  it('keeps clients per hub instance', () => {
    const a = new ReportHub();
    const b = new ReportHub();
    a.add(new FakeSocket());
    expect(b.size).toBe(0);
  });
});

function opened(socket: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.once('open', () => resolve());
    socket.once('error', reject);
  });
}

function nextMessage(socket: WebSocket): Promise<string> {
  return new Promise(resolve => {
    socket.once('message', data => resolve(data.toString()));
  });
}

function closed(socket: WebSocket): Promise<void> {
  return new Promise(resolve => {
    socket.once('close', () => resolve());
  });
}

describe('ReportServer', () => {
  const servers: ReportServer[] = [];

  function quietServer(): ReportServer {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const server = new ReportServer({ port: 0 });
    servers.push(server);
    return server;
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(server => server.close()));
    vi.restoreAllMocks();
  });

  it('serves the chart page and 404s everything else', async () => {
    const server = quietServer();
    await server.start();
    expect(server.port).toBeGreaterThan(0);

    const page = await fetch(`http://127.0.0.1:${server.port}/`);
    expect(page.status).toBe(200);
    expect(page.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await page.text()).toContain('<html');

    const missing = await fetch(`http://127.0.0.1:${server.port}/nothing`);
    expect(missing.status).toBe(404);
    expect(await missing.text()).toBe('Not found');
  });

  it('streams broadcasts to clients on /ws and drops them on close', async () => {
    const server = quietServer();
    await server.start();
    const client = new WebSocket(`ws://127.0.0.1:${server.port}/ws`);
    await opened(client);
    expect(server.clientCount).toBe(1);

    const received = nextMessage(client);
    server.broadcast(message);
    expect(JSON.parse(await received)).toEqual(message);

    const clientClosed = closed(client);
    await server.close();
    await clientClosed;
    expect(server.clientCount).toBe(0);
    expect(server.port).toBe(0);
  });

  it('rejects start() when the port is taken', async () => {
    const first = quietServer();
    await first.start();
    const second = new ReportServer({ port: first.port });

    await expect(second.start()).rejects.toMatchObject({ code: 'EADDRINUSE' });
    await second.close();
  });


  it('defaults to port 5000', () => {
    expect(new ReportServer().url).toBe('http://localhost:5000');
  });

  it('rejects ports outside 1000-65535 other than 0', () => {
    expect(() => new ReportServer({ port: 80 })).toThrow(ConfigurationError);
    expect(() => new ReportServer({ port: 65535 })).toThrow(ConfigurationError);
  });
});
