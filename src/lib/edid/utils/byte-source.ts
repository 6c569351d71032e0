/**
 * Byte source capability
 *
 * The decoder reads through this interface only. Concrete sources (I2C/DDC,
 * OS display APIs, files) live with the caller.
 */

import { EdidReadError, EdidTruncatedError } from './errors.js';

/**
 * Anything that can fill a caller-provided buffer
 */
export interface ByteSource {
	/**
	 * Copy up to `buffer.length` bytes into `buffer`.
	 * @returns Number of bytes written; fewer than requested means the data ran out
	 * @throws on I/O failure
	 */
	read(buffer: Uint8Array): number;
}

/**
 * Source over an in-memory buffer; consecutive reads continue where the last one stopped
 */
export function bufferSource(bytes: Uint8Array): ByteSource {
	let position = 0;
	return {
		read(buffer: Uint8Array): number {
			const count = Math.min(buffer.length, bytes.length - position);
			buffer.set(bytes.subarray(position, position + count));
			position += count;
			return count;
		}
	};
}

export function isByteSource(value: unknown): value is ByteSource {
	return (
		typeof value === 'object' &&
		value !== null &&
		'read' in value &&
		typeof value.read === 'function'
	);
}

/**
 * Read exactly `length` bytes with a single `read` call.
 * There is no retry on a short read; a source wanting one does it itself.
 */
export function readExact(source: ByteSource, length: number): Uint8Array {
	const buffer = new Uint8Array(length);
	let received: number;
	try {
		received = source.read(buffer);
	} catch (error) {
		throw new EdidReadError(error);
	}
	if (!Number.isInteger(received) || received < length) {
		throw new EdidTruncatedError(length, Number.isInteger(received) ? received : 0);
	}
	return buffer;
}
