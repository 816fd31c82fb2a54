// ---------------------------------------------------------------------------
// Value sizing
// ---------------------------------------------------------------------------

/**
 * Approximate in-memory footprint of a cached value in bytes: UTF-8 length
 * for strings, `byteLength` for binary data, UTF-8 length of the JSON
 * serialisation for everything else.
 */
export const estimateSize = (value: unknown): number => {
	if (value === undefined || value === null) return 0;
	if (typeof value === 'string') return Buffer.byteLength(value, 'utf8');
	if (ArrayBuffer.isView(value)) return value.byteLength;
	if (value instanceof ArrayBuffer) return value.byteLength;

	let json: string | undefined;
	try {
		json = JSON.stringify(value);
	} catch {
		// Circular or BigInt-bearing values: fall back to the string form.
		json = String(value);
	}
	return json === undefined ? 0 : Buffer.byteLength(json, 'utf8');
};

/** A size hint wins when it is a finite, non-negative number. */
export const isValidSizeHint = (hint: number | undefined): hint is number =>
	hint !== undefined && Number.isFinite(hint) && hint >= 0;
