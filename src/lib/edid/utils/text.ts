/**
 * Descriptor text decoding
 */

import type { EdidLogger } from '../types/index.js';
import { silentLogger } from './logger.js';

const LINE_FEED = 0x0a;
const ASCII_LIMIT = 0x80;

/**
 * Decode ASCII string from bytes, dropping non-ASCII bytes
 */
export function decodeASCII(bytes: Uint8Array): string {
	const validBytes = bytes.filter((b) => b < ASCII_LIMIT);
	return String.fromCharCode(...validBytes);
}

/**
 * Decode the text payload of a name or serial number descriptor.
 * Text ends at the first line feed; the rest of the field is space padding.
 * Bytes outside ASCII are dropped with a warning.
 */
export function decodeDescriptorText(
	payload: Uint8Array,
	logger: EdidLogger = silentLogger
): string {
	const end = payload.indexOf(LINE_FEED);
	const field = end >= 0 ? payload.subarray(0, end) : payload;
	const dropped = field.filter((b) => b >= ASCII_LIMIT).length;
	if (dropped > 0) {
		logger.warn(`Descriptor text contains ${dropped} non-ASCII byte(s); dropped`);
	}
	return decodeASCII(field).trimEnd();
}
