import {
	MANUFACTURE_WEEK_OFFSET,
	MANUFACTURE_YEAR_OFFSET,
	MANUFACTURER_ID_OFFSET,
	PRODUCT_CODE_OFFSET,
	SERIAL_NUMBER_OFFSET,
	YEAR_BASE
} from '../constants.js';
import type { ProductInformation } from '../types/index.js';
import { extractBits, type BinaryReader } from '../utils/struct.js';
import type { DecodeContext } from './context.js';

// 5-bit letter codes are biased so that 1 = 'A'
const LETTER_BIAS = 0x40;

/**
 * Decode the three 5-bit letters of a big-endian manufacturer ID.
 * Codes outside 1-26 are passed through as their biased character.
 */
export function decodeManufacturerId(packed: number): string {
	return [10, 5, 0]
		.map((shift) => String.fromCharCode(LETTER_BIAS + extractBits(packed, shift, 5)))
		.join('');
}

/**
 * Pack three letters into the two manufacturer ID bytes
 * @throws {RangeError} unless given exactly three letters A-Z
 */
export function encodeManufacturerId(letters: string): Uint8Array {
	if (!/^[A-Z]{3}$/.test(letters)) {
		throw new RangeError(`Manufacturer ID must be three letters A-Z, got "${letters}"`);
	}
	const packed = [...letters].reduce(
		(acc, letter) => (acc << 5) | (letter.charCodeAt(0) - LETTER_BIAS),
		0
	);
	return new Uint8Array([packed >> 8, packed & 0xff]);
}

export function decodeProductInformation(
	reader: BinaryReader,
	context: DecodeContext
): ProductInformation {
	const manufacturerId = decodeManufacturerId(reader.readU16BE(MANUFACTURER_ID_OFFSET));
	if (!/^[A-Z]{3}$/.test(manufacturerId)) {
		context.logger.warn(`Manufacturer ID "${manufacturerId}" contains letters outside A-Z`);
	}

	return {
		manufacturerId,
		productCode: reader.readU16LE(PRODUCT_CODE_OFFSET),
		serialNumber: reader.readU32LE(SERIAL_NUMBER_OFFSET),
		manufactureDate: {
			week: reader.readU8(MANUFACTURE_WEEK_OFFSET),
			year: reader.readU8(MANUFACTURE_YEAR_OFFSET) + YEAR_BASE
		}
	};
}
