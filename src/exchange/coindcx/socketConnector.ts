import { io } from 'socket.io-client';
import { TransportError } from '../../infra/errors';
import type { StreamConnector } from '../stream';
import type { SocketFrame } from './tradeCodec';

// ============================================================================
// socket.io -> StreamConnection
// ----------------------------------------------------------------------------
// Входящие события отдаются воркеру кадрами {"event":..., "data":...},
// исходящие кадры того же вида превращаются в socket.emit(event, data).
// Переподключением управляет StreamingWorker, поэтому reconnection: false.
// ============================================================================

const NORMAL_CLOSE = 1000;
const ABNORMAL_CLOSE = 1006;

function parseOutgoing(text: string): SocketFrame {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw new TransportError('socket.io frame is not valid JSON', undefined, err);
    }
    if (typeof parsed !== 'object' || parsed === null || !('event' in parsed) || typeof parsed.event !== 'string') {
        throw new TransportError('socket.io frame has no event name');
    }
    return { event: parsed.event, data: 'data' in parsed ? parsed.data : undefined };
}

export const socketIoConnector: StreamConnector = (url, handlers) => {
    const socket = io(url, { transports: ['websocket'], reconnection: false, forceNew: true });
    let closed = false;

    // close-уведомление ровно одно, даже если сокет так и не подключился
    const notifyClose = (code: number, reason: string) => {
        if (closed) return;
        closed = true;
        socket.offAny();
        socket.removeAllListeners();
        handlers.onClose(code, reason);
    };

    socket.on('connect', () => handlers.onOpen());
    socket.onAny((event: string, payload?: unknown) => {
        handlers.onMessage(JSON.stringify({ event, data: payload } satisfies SocketFrame));
    });
    socket.on('connect_error', (err: Error) => {
        handlers.onError(err);
        notifyClose(ABNORMAL_CLOSE, err.message);
    });
    socket.on('disconnect', (reason: string) => {
        notifyClose(reason === 'io client disconnect' ? NORMAL_CLOSE : ABNORMAL_CLOSE, reason);
    });

    return {
        isOpen: () => socket.connected,
        send: (text) => {
            const frame = parseOutgoing(text);
            socket.emit(frame.event, frame.data);
        },
        close: (code = NORMAL_CLOSE, reason = 'client close') => {
            socket.disconnect();
            notifyClose(code, reason);
        },
        terminate: () => {
            notifyClose(ABNORMAL_CLOSE, 'terminated');
            socket.disconnect();
        },
    };
};
