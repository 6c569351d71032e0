/**
 * Two-byte standard timing identifiers
 * Used by bytes 38-53 and by standard timing descriptors (tag 0xFA)
 */

import { STANDARD_TIMING_COUNT, STANDARD_TIMINGS_OFFSET, UNUSED_STANDARD_TIMING } from '../constants.js';
import type { AspectRatio, StandardTiming } from '../types/index.js';
import { extractBits, type BinaryReader } from '../utils/struct.js';
import type { DecodeContext } from './context.js';

const ASPECT_RATIOS: Readonly<Record<AspectRatio, readonly [number, number]>> = {
	'1:1': [1, 1],
	'16:10': [16, 10],
	'4:3': [4, 3],
	'5:4': [5, 4],
	'16:9': [16, 9]
};

/**
 * Aspect ratio code 0 meant 1:1 before EDID 1.3
 */
export function decodeAspectRatio(code: number, revision: number): AspectRatio {
	switch (code) {
		case 0:
			return revision < 3 ? '1:1' : '16:10';
		case 1:
			return '4:3';
		case 2:
			return '5:4';
		default:
			return '16:9';
	}
}

export function isUnusedStandardTiming(first: number, second: number): boolean {
	return first === UNUSED_STANDARD_TIMING && second === UNUSED_STANDARD_TIMING;
}

/**
 * Decode one pair; the caller filters out unused (0x01, 0x01) slots
 */
export function decodeStandardTiming(
	first: number,
	second: number,
	context: DecodeContext
): StandardTiming {
	if (first === 0) {
		context.logger.warn('Standard timing with horizontal byte 0x00 is invalid; decoding anyway');
	}
	const horizontalResolution = (first + 31) * 8;
	const aspectRatio = decodeAspectRatio(extractBits(second, 6, 2), context.revision);
	const [aspectWidth, aspectHeight] = ASPECT_RATIOS[aspectRatio];

	return {
		horizontalResolution,
		verticalResolution: Math.round((horizontalResolution * aspectHeight) / aspectWidth),
		aspectRatio,
		refreshRate: extractBits(second, 0, 6) + 60
	};
}

/**
 * Decode `count` consecutive pairs starting at `offset`, skipping unused slots
 */
export function decodeStandardTimingList(
	reader: BinaryReader,
	offset: number,
	count: number,
	context: DecodeContext
): StandardTiming[] {
	const timings: StandardTiming[] = [];

	for (let slot = 0; slot < count; slot++) {
		const first = reader.readU8(offset + slot * 2);
		const second = reader.readU8(offset + slot * 2 + 1);
		if (isUnusedStandardTiming(first, second)) {
			continue;
		}
		timings.push(decodeStandardTiming(first, second, context));
	}

	return timings;
}

export function decodeStandardTimings(reader: BinaryReader, context: DecodeContext): StandardTiming[] {
	return decodeStandardTimingList(reader, STANDARD_TIMINGS_OFFSET, STANDARD_TIMING_COUNT, context);
}
