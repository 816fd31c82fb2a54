// ---------------------------------------------------------------------------
// EventBus: Type definitions
// ---------------------------------------------------------------------------

import type { MemoryPressureLevel } from '../memory/types.js';

/**
 * Exhaustive map of every event the cache subsystem can publish.
 * Each key is a dotted event name; its value is the readonly payload shape.
 */
export interface EventPayloadMap {
	'memory.pressure': {
		readonly level: MemoryPressureLevel;
		readonly previousLevel: MemoryPressureLevel;
		readonly rssBytes: number;
		readonly limitBytes: number;
	};
	'memory.cleanup': {
		readonly mode: 'soft' | 'hard' | 'target';
		readonly freedBytes: number;
		readonly evictedEntries: number;
		readonly degraded: boolean;
	};
	'memory.gc': { readonly collected: boolean };
	'project-cache.created': { readonly projectId: string };
	'project-cache.closed': { readonly projectId: string };
	'response-cache.write-dropped': {
		readonly key: string;
		readonly reason: string;
	};
}

/** Union of all recognised event names. */
export type EventType = keyof EventPayloadMap;

/** Payload type for a specific event. */
export type EventPayload<T extends EventType> = EventPayloadMap[T];

/** Handler function for a specific event type. */
export type EventHandler<T extends EventType> = (
	payload: EventPayload<T>,
) => void;

// ---------------------------------------------------------------------------
// EventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed, synchronous publish/subscribe event bus.
 *
 * - `publish` delivers a payload to every subscriber of the given event type.
 * - `subscribe` registers a handler and returns an unsubscribe function.
 * - `subscribeAll` registers a wildcard handler that receives every event.
 */
export interface EventBus {
	readonly publish: <T extends EventType>(
		type: T,
		payload: EventPayload<T>,
	) => void;
	readonly subscribe: <T extends EventType>(
		type: T,
		handler: EventHandler<T>,
	) => () => void;
	readonly subscribeAll: (
		handler: (type: EventType, payload: unknown) => void,
	) => () => void;
	/** Remove all event handlers (both per-type and global). */
	readonly clear: () => void;
}
