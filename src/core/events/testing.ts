import { EventBus, type BusEventMap, type BusEventName } from './EventBus';

/**
 * Изолированная шина для тестов: без утечек подписок между кейсами.
 */
export function createTestEventBus(): EventBus {
    return new EventBus();
}

// Копит payload'ы одного topic в массив, пока не вызван stop().
export function recordEvents<T extends BusEventName>(
    bus: EventBus,
    topic: T
): { events: BusEventMap[T][]; stop: () => void } {
    const events: BusEventMap[T][] = [];
    const handler = (payload: BusEventMap[T]): void => {
        events.push(payload);
    };
    bus.subscribe(topic, handler);
    return { events, stop: () => bus.unsubscribe(topic, handler) };
}
