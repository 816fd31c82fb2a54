// ---------------------------------------------------------------------------
// Response fingerprints
// ---------------------------------------------------------------------------
//
// A cache key covers both the request and the project context that was
// injected into the prompt, so a response is only reused when the model
// would have seen the same input. Keys are the SHA-256 of a canonical
// JSON document with sorted object keys.
// ---------------------------------------------------------------------------

import { createHash } from 'node:crypto';
import type { JsonValue } from './types.js';

export const MAX_CONTEXT_CHARACTERS = 5;
export const RECENT_CONTENT_CHARS = 500;
export const OUTLINE_CHARS = 1000;

/** Canonical description of an AI provider call. */
export interface RequestDescriptor {
	readonly provider: string;
	readonly endpoint: string;
	readonly parameters?: { readonly [key: string]: JsonValue | undefined };
}

export type CharacterRef = string | { readonly name: string };

/** Project fields that end up in the prompt. */
export interface ProjectContext {
	readonly projectId?: string;
	readonly genre?: string;
	readonly style?: string;
	readonly targetAudience?: string;
	readonly themes?: string | readonly string[];
	readonly setting?: string;
	readonly characters?: readonly CharacterRef[];
	readonly recentContent?: string;
	readonly outline?: string;
}

export interface ResponseFingerprint {
	/** SHA-256 hex digest. */
	readonly key: string;
	readonly request: RequestDescriptor;
	readonly context?: ProjectContext;
}

/** A fingerprint, or a key computed earlier from one. */
export type FingerprintLike = ResponseFingerprint | string;

// ---------------------------------------------------------------------------
// Canonical JSON
// ---------------------------------------------------------------------------

type Canonicalizable =
	| JsonValue
	| undefined
	| readonly Canonicalizable[]
	| { readonly [key: string]: Canonicalizable };

/**
 * JSON with object keys sorted at every depth and `undefined` members
 * dropped. Equal values always produce the same string.
 */
export function canonicalJson(value: Canonicalizable): string {
	if (value === undefined || value === null) return 'null';
	if (typeof value !== 'object') return JSON.stringify(value);
	if (Array.isArray(value)) {
		return `[${value.map((item: Canonicalizable) => canonicalJson(item)).join(',')}]`;
	}
	const members: string[] = [];
	for (const key of Object.keys(value).sort()) {
		const member: Canonicalizable = Reflect.get(value, key);
		if (member === undefined) continue;
		members.push(`${JSON.stringify(key)}:${canonicalJson(member)}`);
	}
	return `{${members.join(',')}}`;
}

// ---------------------------------------------------------------------------
// Context fingerprint
// ---------------------------------------------------------------------------

const characterName = (ref: CharacterRef): string =>
	typeof ref === 'string' ? ref : ref.name;

/**
 * The subset of project context that influences a response: scalar fields
 * as-is, the first five character names, the last 500 characters of recent
 * content and the first 1000 characters of the outline.
 */
export function contextFingerprint(
	context: ProjectContext,
): { readonly [key: string]: JsonValue } {
	const fields: Record<string, JsonValue | undefined> = {
		project_id: context.projectId,
		genre: context.genre,
		style: context.style,
		target_audience: context.targetAudience,
		themes: context.themes,
		setting: context.setting,
		characters: context.characters
			?.slice(0, MAX_CONTEXT_CHARACTERS)
			.map(characterName),
		recent_content:
			context.recentContent === undefined
				? undefined
				: context.recentContent.slice(-RECENT_CONTENT_CHARS),
		outline: context.outline?.slice(0, OUTLINE_CHARS),
	};

	const result: Record<string, JsonValue> = {};
	for (const [name, value] of Object.entries(fields)) {
		if (value !== undefined) result[name] = value;
	}
	return Object.freeze(result);
}

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

/**
 * Build the fingerprint of a request made with the given project context.
 *
 * @example
 * ```ts
 * const fp = createFingerprint(
 *   { provider: 'openai', endpoint: 'chat.completions', parameters: { model: 'gpt-4o', temperature: 0.7 } },
 *   { projectId: 'my-novel', genre: 'mystery', recentContent: chapterTail },
 * );
 * const cached = await responseCache.get(fp);
 * ```
 */
export function createFingerprint(
	request: RequestDescriptor,
	context?: ProjectContext,
): ResponseFingerprint {
	const document = {
		request: {
			provider: request.provider,
			endpoint: request.endpoint,
			parameters: request.parameters ?? {},
		},
		context: context ? contextFingerprint(context) : {},
	};
	const key = createHash('sha256').update(canonicalJson(document)).digest('hex');
	return Object.freeze({ key, request, context });
}

export const fingerprintKey = (fingerprint: FingerprintLike): string =>
	typeof fingerprint === 'string' ? fingerprint : fingerprint.key;
