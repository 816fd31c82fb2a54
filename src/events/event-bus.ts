// ---------------------------------------------------------------------------
// EventBus: Factory implementation
// ---------------------------------------------------------------------------

import { getDefaultLogger, type Logger } from '../logger.js';
import type {
	EventBus,
	EventHandler,
	EventPayload,
	EventType,
} from './types.js';

export interface EventBusOptions {
	/** Receives handler failures. Defaults to a child of the default logger. */
	readonly logger?: Logger;
}

/**
 * Create a typed event bus that decouples the memory manager and caches
 * from whoever observes them.
 *
 * - Handlers are invoked synchronously in registration order.
 * - Errors thrown by individual handlers are logged; they never propagate
 *   to other handlers or the publisher.
 * - `subscribe` returns an idempotent unsubscribe function.
 */
export const createEventBus = (options: EventBusOptions = {}): EventBus => {
	const logger = options.logger ?? getDefaultLogger().child('events');

	/** Per-event-type handler sets. */
	const handlers = new Map<EventType, Set<EventHandler<EventType>>>();

	/** Wildcard handlers that receive every event. */
	const globalHandlers = new Set<(type: EventType, payload: unknown) => void>();

	const publish = <T extends EventType>(
		type: T,
		payload: EventPayload<T>,
	): void => {
		const set = handlers.get(type);
		if (set) {
			for (const handler of set) {
				try {
					(handler as EventHandler<T>)(payload);
				} catch (err) {
					logger.error(`Handler failed for "${type}"`, {
						error: err instanceof Error ? err.message : String(err),
					});
				}
			}
		}

		for (const handler of globalHandlers) {
			try {
				handler(type, payload);
			} catch (err) {
				logger.error(`Global handler failed for "${type}"`, {
					error: err instanceof Error ? err.message : String(err),
				});
			}
		}
	};

	const subscribe = <T extends EventType>(
		type: T,
		handler: EventHandler<T>,
	): (() => void) => {
		let set = handlers.get(type);
		if (!set) {
			set = new Set();
			handlers.set(type, set);
		}
		const registered = set;
		registered.add(handler as EventHandler<EventType>);

		return () => {
			registered.delete(handler as EventHandler<EventType>);
		};
	};

	const subscribeAll = (
		handler: (type: EventType, payload: unknown) => void,
	): (() => void) => {
		globalHandlers.add(handler);
		return () => {
			globalHandlers.delete(handler);
		};
	};

	const clear = (): void => {
		handlers.clear();
		globalHandlers.clear();
	};

	return Object.freeze({ publish, subscribe, subscribeAll, clear });
};
