export { createEventBus, type EventBusOptions } from './event-bus.js';
export type {
	EventBus,
	EventHandler,
	EventPayload,
	EventPayloadMap,
	EventType,
} from './types.js';
