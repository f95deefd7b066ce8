import type { StreamConnection, StreamConnectionHandlers, StreamConnector } from '../../src/exchange/stream';

type FakeState = 'connecting' | 'open' | 'closed';

/** In-process stand-in for a websocket: the test drives the server side. */
export class FakeConnection implements StreamConnection {
  readonly sent: string[] = [];
  state: FakeState = 'connecting';
  closeCode?: number;

  constructor(readonly url: string, private readonly handlers: StreamConnectionHandlers) {}

  acceptOpen(): void {
    this.state = 'open';
    this.handlers.onOpen();
  }

  deliver(message: unknown): void {
    this.handlers.onMessage(typeof message === 'string' ? message : JSON.stringify(message));
  }

  dropFromServer(code = 1006, reason = ''): void {
    this.finish(code, reason);
  }

  failWith(err: Error): void {
    this.handlers.onError(err);
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  send(text: string): void {
    if (this.state !== 'open') throw new Error('socket not open');
    this.sent.push(text);
  }

  close(code = 1000, reason = ''): void {
    this.finish(code, reason);
  }

  terminate(): void {
    this.finish(1006, '');
  }

  private finish(code: number, reason: string): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.closeCode = code;
    this.handlers.onClose(code, reason);
  }
}

export function createFakeConnector(): { connector: StreamConnector; connections: FakeConnection[] } {
  const connections: FakeConnection[] = [];
  const connector: StreamConnector = (url, handlers) => {
    const connection = new FakeConnection(url, handlers);
    connections.push(connection);
    return connection;
  };
  return { connector, connections };
}

export const tickerMessage = (symbol: string, lastPrice: string, ts = 1_700_000_000_000) => ({
  topic: `tickers.${symbol}`,
  ts,
  type: 'snapshot',
  data: { symbol, lastPrice },
});

/** Drains pending promise callbacks without moving fake time. */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await Promise.resolve();
  }
}
