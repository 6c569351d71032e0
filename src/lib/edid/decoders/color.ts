/**
 * Chromaticity coordinates (bytes 25-34)
 *
 * Each coordinate is a 10-bit binary fraction. The two low bits of all eight
 * coordinates are packed into bytes 25-26; the high eight bits follow one
 * byte per coordinate.
 */

import { CHROMATICITY_OFFSET } from '../constants.js';
import type { Chromaticity, ColorCharacteristics } from '../types/index.js';
import { extractBits, fixedPointToFloat, joinBits, type BinaryReader } from '../utils/struct.js';

const COORDINATE_BITS = 10;

/**
 * Combine a high byte with its 2-bit low part into a [0, 1) coordinate
 */
export function decodeCoordinate(high: number, low: number): number {
	return fixedPointToFloat(joinBits(high, low, 2), COORDINATE_BITS);
}

/**
 * Decode one x/y pair
 * @param lowBits - Byte holding the pair's low bits
 * @param shift - Bit position of the x low bits (y follows 2 bits below)
 */
function decodePair(lowBits: number, shift: number, highX: number, highY: number): Chromaticity {
	return {
		x: decodeCoordinate(highX, extractBits(lowBits, shift, 2)),
		y: decodeCoordinate(highY, extractBits(lowBits, shift - 2, 2))
	};
}

export function decodeColorCharacteristics(reader: BinaryReader): ColorCharacteristics {
	const redGreenLow = reader.readU8(CHROMATICITY_OFFSET);
	const blueWhiteLow = reader.readU8(CHROMATICITY_OFFSET + 1);
	const high = (index: number): number => reader.readU8(CHROMATICITY_OFFSET + 2 + index);

	return {
		red: decodePair(redGreenLow, 6, high(0), high(1)),
		green: decodePair(redGreenLow, 2, high(2), high(3)),
		blue: decodePair(blueWhiteLow, 6, high(4), high(5)),
		white: decodePair(blueWhiteLow, 2, high(6), high(7)),
		whitePoints: []
	};
}
