import { CHECKSUM_OFFSET, EXTENSION_COUNT_OFFSET } from '../constants.js';
import { EdidChecksumError } from '../utils/errors.js';
import type { BinaryReader } from '../utils/struct.js';

/**
 * Sum of all bytes modulo 256; zero for a valid block
 */
export function checksumOf(block: Uint8Array): number {
	return block.reduce((sum, byte) => (sum + byte) & 0xff, 0);
}

/**
 * @throws {EdidChecksumError} when the block does not sum to zero
 */
export function validateChecksum(block: Uint8Array): void {
	const sum = checksumOf(block);
	if (sum !== 0) {
		throw new EdidChecksumError(sum, block[CHECKSUM_OFFSET]);
	}
}

/**
 * Number of extension blocks declared after the base block
 */
export function readExtensionCount(reader: BinaryReader): number {
	return reader.readU8(EXTENSION_COUNT_OFFSET);
}
