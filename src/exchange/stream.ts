import WebSocket, { type RawData } from 'ws';

// ============================================================================
// Streaming transport
// ----------------------------------------------------------------------------
// StreamingWorker не работает с ws напрямую: он получает StreamConnection через
// StreamConnector. В проде это wsConnector, в тестах in-process fake.
// ============================================================================

export interface StreamConnectionHandlers {
    onOpen(): void;
    onMessage(text: string): void;
    onClose(code: number, reason: string): void;
    onError(err: Error): void;
}

export interface StreamConnection {
    isOpen(): boolean;
    send(text: string): void;
    /** Close handshake. */
    close(code?: number, reason?: string): void;
    /** Drop the socket immediately; a close notification still follows. */
    terminate(): void;
}

export type StreamConnector = (url: string, handlers: StreamConnectionHandlers) => StreamConnection;

// ---------------------------------------------------------------------------
// Wire messages, decoded at the parse boundary
// ---------------------------------------------------------------------------

export interface SubscribeAck {
    kind: 'subscribe_ack';
    success: boolean;
    message?: string;
}

export interface DataUpdate {
    kind: 'data_update';
    topic: string;
    symbol: string;
    lastPrice?: string;
}

export interface Unrecognized {
    kind: 'unrecognized';
    reason: string;
}

export type StreamMessage = SubscribeAck | DataUpdate | Unrecognized;

/** Venue-specific framing for a ticker stream. decode() throws ParseError. */
export interface StreamCodec {
    readonly venue: string;
    buildSubscribeMessages(symbols: readonly string[]): string[];
    buildPing(): string | undefined;
    decode(raw: string): StreamMessage;
}

export const wsConnector: StreamConnector = (url, handlers) => {
    const socket = new WebSocket(url);

    socket.on('open', () => handlers.onOpen());
    socket.on('message', (data: RawData) => handlers.onMessage(data.toString()));
    socket.on('close', (code: number, reason: Buffer) => {
        socket.removeAllListeners();
        // после removeAllListeners поздние 'error' от ws не должны ронять процесс
        socket.on('error', () => undefined);
        handlers.onClose(code, reason.toString());
    });
    socket.on('error', (err: Error) => handlers.onError(err));

    return {
        isOpen: () => socket.readyState === WebSocket.OPEN,
        send: (text) => {
            socket.send(text);
        },
        close: (code = 1000, reason = 'client close') => {
            if (socket.readyState === WebSocket.CLOSING || socket.readyState === WebSocket.CLOSED) return;
            socket.close(code, reason);
        },
        terminate: () => {
            socket.terminate();
        },
    };
};
