// ---------------------------------------------------------------------------
// Structured Logger: Functional API
// ---------------------------------------------------------------------------
//
// Loggers are frozen records of functions closing over a shared state
// object. A child logger shares its parent's level and transport list, so
// `setLevel()` on the root affects every cache component at once.
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = Object.freeze({
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	none: 4,
});

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export interface LogEntry {
	readonly level: LogLevel;
	readonly message: string;
	readonly timestamp: string;
	readonly context?: string;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Transports
// ---------------------------------------------------------------------------

export interface LogTransport {
	readonly write: (entry: LogEntry) => void;
}

const COLOURS: Readonly<Record<string, string>> = Object.freeze({
	debug: '\x1b[90m',
	info: '\x1b[36m',
	warn: '\x1b[33m',
	error: '\x1b[31m',
	reset: '\x1b[0m',
});

/**
 * Create a transport that writes formatted log entries to the console.
 */
export const createConsoleTransport = (): LogTransport =>
	Object.freeze({
		write(entry: LogEntry): void {
			const colour = COLOURS[entry.level] ?? COLOURS.reset;
			const reset = COLOURS.reset;
			const prefix = entry.context ? `[${entry.context}]` : '';
			const tag = entry.level.toUpperCase().padEnd(5);
			const base = `${colour}${tag}${reset} ${entry.timestamp} ${prefix} ${entry.message}`;
			const hasMetadata =
				entry.metadata !== undefined && Object.keys(entry.metadata).length > 0;

			const logFn =
				entry.level === 'error'
					? console.error
					: entry.level === 'warn'
						? console.warn
						: entry.level === 'debug'
							? console.debug
							: console.log;

			if (hasMetadata) {
				logFn(base, entry.metadata);
			} else {
				logFn(base);
			}
		},
	});

/**
 * A transport backed by a mutable array. Tests inspect `entries` directly.
 */
export interface MemoryTransportHandle extends LogTransport {
	readonly entries: LogEntry[];
	readonly clear: () => void;
	readonly filter: (level: LogLevel) => readonly LogEntry[];
}

export const createMemoryTransport = (): MemoryTransportHandle => {
	const entries: LogEntry[] = [];

	return {
		entries,
		write(entry: LogEntry): void {
			entries.push(entry);
		},
		clear(): void {
			entries.length = 0;
		},
		filter(level: LogLevel): readonly LogEntry[] {
			return entries.filter((e) => e.level === level);
		},
	};
};

// ---------------------------------------------------------------------------
// Logger interface
// ---------------------------------------------------------------------------

export interface Logger {
	readonly debug: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly info: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly warn: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly error: (
		message: string,
		errorOrMetadata?: Error | Readonly<Record<string, unknown>>,
	) => void;
	readonly child: (childContext: string) => Logger;
	readonly setLevel: (level: LogLevel) => void;
	readonly getLevel: () => LogLevel;
	readonly addTransport: (transport: LogTransport) => void;
	readonly clearTransports: () => void;
}

export interface LoggerOptions {
	readonly context?: string;
	readonly level?: LogLevel;
	readonly transports?: readonly LogTransport[];
}

// ---------------------------------------------------------------------------
// Error flattening
// ---------------------------------------------------------------------------

const describeCause = (cause: unknown): string =>
	cause instanceof Error ? cause.message : String(cause);

const resolveErrorMetadata = (
	errorOrMetadata: Error | Readonly<Record<string, unknown>> | undefined,
): Readonly<Record<string, unknown>> | undefined => {
	if (errorOrMetadata === undefined) return undefined;
	if (!(errorOrMetadata instanceof Error)) return errorOrMetadata;

	return {
		errorName: errorOrMetadata.name,
		errorMessage: errorOrMetadata.message,
		stack: errorOrMetadata.stack,
		...(errorOrMetadata.cause != null
			? { cause: describeCause(errorOrMetadata.cause) }
			: {}),
	};
};

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/** Shared by a logger and all of its children. */
interface LoggerState {
	level: LogLevel;
	readonly transports: LogTransport[];
}

const buildLogger = (state: LoggerState, context?: string): Logger => {
	const log = (
		level: LogLevel,
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	): void => {
		if (level === 'none') return;
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[state.level]) return;

		const entry: LogEntry = Object.freeze({
			level,
			message,
			timestamp: new Date().toISOString(),
			context,
			metadata,
		});

		for (const transport of state.transports) {
			transport.write(entry);
		}
	};

	return Object.freeze({
		debug: (message, metadata?) => log('debug', message, metadata),
		info: (message, metadata?) => log('info', message, metadata),
		warn: (message, metadata?) => log('warn', message, metadata),
		error: (message, errorOrMetadata?) =>
			log('error', message, resolveErrorMetadata(errorOrMetadata)),

		child: (childContext: string): Logger =>
			buildLogger(
				state,
				context ? `${context}:${childContext}` : childContext,
			),

		setLevel: (level: LogLevel): void => {
			state.level = level;
		},
		getLevel: (): LogLevel => state.level,

		addTransport: (transport: LogTransport): void => {
			state.transports.push(transport);
		},
		clearTransports: (): void => {
			state.transports.length = 0;
		},
	} satisfies Logger);
};

export const createLogger = (options: LoggerOptions = {}): Logger =>
	buildLogger(
		{
			level: options.level ?? 'info',
			transports: options.transports
				? [...options.transports]
				: [createConsoleTransport()],
		},
		options.context,
	);

/**
 * A logger that drops every entry. Components fall back to it only when the
 * caller explicitly asks for silence.
 */
export const createNoopLogger = (): Logger =>
	createLogger({ level: 'none', transports: [] });

// ---------------------------------------------------------------------------
// Default singleton
// ---------------------------------------------------------------------------

let _defaultLogger: Logger | undefined;

/**
 * Get (or create) the default application-wide logger.
 * Call `setDefaultLogger()` to replace it.
 */
export const getDefaultLogger = (): Logger => {
	if (!_defaultLogger) {
		_defaultLogger = createLogger({ context: 'manuscript-cache' });
	}
	return _defaultLogger;
};

/**
 * Replace the default application-wide logger.
 */
export const setDefaultLogger = (logger: Logger): void => {
	_defaultLogger = logger;
};
