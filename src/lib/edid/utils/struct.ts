/**
 * Binary data utilities
 * Fixed-offset integer reads and bit-field helpers used by every decoder
 */

function checkBounds(data: Uint8Array, offset: number, size: number): void {
	if (!Number.isInteger(offset) || offset < 0 || offset + size > data.length) {
		throw new RangeError(
			`Read of ${size} byte(s) at offset ${offset} exceeds buffer length ${data.length}`
		);
	}
}

/**
 * Read unsigned 8-bit integer
 */
export function readU8(data: Uint8Array, offset: number): number {
	checkBounds(data, offset, 1);
	return data[offset];
}

/**
 * Read unsigned 16-bit little-endian integer
 */
export function readU16LE(data: Uint8Array, offset: number): number {
	checkBounds(data, offset, 2);
	return data[offset] | (data[offset + 1] << 8);
}

/**
 * Read unsigned 16-bit big-endian integer
 */
export function readU16BE(data: Uint8Array, offset: number): number {
	checkBounds(data, offset, 2);
	return (data[offset] << 8) | data[offset + 1];
}

/**
 * Read unsigned 32-bit little-endian integer
 */
export function readU32LE(data: Uint8Array, offset: number): number {
	checkBounds(data, offset, 4);
	return (
		(data[offset] |
			(data[offset + 1] << 8) |
			(data[offset + 2] << 16) |
			(data[offset + 3] << 24)) >>>
		0
	);
}

/**
 * Extract an unsigned bit field from a value
 * @param value - Source value (usually one byte)
 * @param shift - Position of the field's least significant bit
 * @param width - Field width in bits (1-31)
 */
export function extractBits(value: number, shift: number, width: number): number {
	if (width <= 0 || width > 31) {
		throw new RangeError(`Bit width must be between 1 and 31, got ${width}`);
	}
	return (value >>> shift) & ((1 << width) - 1);
}

/**
 * Test a single bit
 */
export function isBitSet(value: number, bit: number): boolean {
	return extractBits(value, bit, 1) === 1;
}

/**
 * Reassemble a field split across bytes, high part first
 * e.g. joinBits(0x0b, 0x40, 8) === 0xb40 for an 8+4 split
 * @param high - Upper bits of the field
 * @param low - Lower bits of the field
 * @param lowWidth - Number of bits held by `low`
 */
export function joinBits(high: number, low: number, lowWidth: number): number {
	return ((high << lowWidth) | extractBits(low, 0, lowWidth)) >>> 0;
}

/**
 * Convert an unsigned N-bit binary fraction to a number in [0, 1)
 */
export function fixedPointToFloat(value: number, bits: number): number {
	return value / 2 ** bits;
}

/**
 * Random-access reader over a fixed buffer
 */
export class BinaryReader {
	private readonly data: Uint8Array;

	constructor(data: Uint8Array) {
		this.data = data;
	}

	get length(): number {
		return this.data.length;
	}

	readU8(offset: number): number {
		return readU8(this.data, offset);
	}

	readU16LE(offset: number): number {
		return readU16LE(this.data, offset);
	}

	readU16BE(offset: number): number {
		return readU16BE(this.data, offset);
	}

	readU32LE(offset: number): number {
		return readU32LE(this.data, offset);
	}

	/**
	 * Copy `length` bytes starting at `offset`
	 */
	readBytes(offset: number, length: number): Uint8Array {
		checkBounds(this.data, offset, length);
		return this.data.slice(offset, offset + length);
	}

	/**
	 * Reader over a sub-range; shares the underlying buffer
	 */
	subReader(offset: number, length: number): BinaryReader {
		checkBounds(this.data, offset, length);
		return new BinaryReader(this.data.subarray(offset, offset + length));
	}
}
