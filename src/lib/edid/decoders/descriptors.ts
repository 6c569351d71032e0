/**
 * Monitor descriptors: 18-byte blocks whose pixel clock bytes are zero.
 * Byte 3 is the tag; bytes 5-17 are the payload.
 */

import {
	DESCRIPTOR_PAYLOAD_SIZE,
	TAG_COLOR_POINT,
	TAG_MONITOR_NAME,
	TAG_RANGE_LIMITS,
	TAG_SERIAL_NUMBER,
	TAG_STANDARD_TIMINGS,
	TAG_UNUSED
} from '../constants.js';
import type {
	CvtAspectRatio,
	CvtSupport,
	MonitorDescriptor,
	RangeLimits,
	SecondaryTiming,
	WhitePoint
} from '../types/index.js';
import { isBitSet, extractBits, joinBits, type BinaryReader } from '../utils/struct.js';
import { decodeDescriptorText } from '../utils/text.js';
import { decodeCoordinate } from './color.js';
import type { DecodeContext } from './context.js';
import { decodeGamma } from './display.js';
import { decodeStandardTimingList } from './standard-timings.js';

const TAG_OFFSET = 3;
const PAYLOAD_OFFSET = 5;

const CVT_ASPECT_RATIOS: readonly CvtAspectRatio[] = ['4:3', '16:9', '16:10', '5:4', '15:9'];

/**
 * Secondary timing formula of a range limits descriptor (bytes 10-17)
 * @param maxPixelClock - Pixel clock limit from byte 9, in Hz
 */
function decodeSecondaryTiming(block: BinaryReader, maxPixelClock: number): SecondaryTiming {
	const code = block.readU8(10);
	switch (code) {
		case 0x00:
			return { kind: 'defaultGtf' };
		case 0x01:
			return { kind: 'rangeLimitsOnly' };
		case 0x02:
			return {
				kind: 'secondaryGtf',
				startFrequency: block.readU8(12) * 2000,
				c: block.readU8(13) / 2,
				m: block.readU16LE(14),
				k: block.readU8(16),
				j: block.readU8(17) / 2
			};
		case 0x04:
			return { kind: 'cvt', ...decodeCvtSupport(block, maxPixelClock) };
		default:
			return { kind: 'other', code, data: block.readBytes(11, 7) };
	}
}

function decodeCvtSupport(block: BinaryReader, maxPixelClock: number): CvtSupport {
	const version = block.readU8(11);
	const precision = block.readU8(12);
	const supported = block.readU8(14);
	const preferred = block.readU8(15);
	const scaling = block.readU8(16);

	return {
		version: extractBits(version, 4, 4) + extractBits(version, 0, 4) / 10,
		// Extra precision is given in 0.25 MHz steps below the byte 9 limit
		maxPixelClock: maxPixelClock - extractBits(precision, 2, 6) * 250_000,
		maxActivePixels: joinBits(extractBits(precision, 0, 2), block.readU8(13), 8) * 8,
		supportedAspectRatios: CVT_ASPECT_RATIOS.filter((_, i) => isBitSet(supported, 7 - i)),
		preferredAspectRatio: CVT_ASPECT_RATIOS[extractBits(preferred, 5, 3)] ?? 'reserved',
		reducedBlanking: isBitSet(preferred, 4),
		standardBlanking: isBitSet(preferred, 3),
		scaling: {
			horizontalShrink: isBitSet(scaling, 7),
			horizontalStretch: isBitSet(scaling, 6),
			verticalShrink: isBitSet(scaling, 5),
			verticalStretch: isBitSet(scaling, 4)
		},
		preferredRefreshRate: block.readU8(17)
	};
}

/**
 * Range limits (tag 0xFD).
 * From revision 4, byte 4 flags limits that carry an extra 255 offset.
 */
export function decodeRangeLimits(block: BinaryReader, context: DecodeContext): RangeLimits {
	const offsets = context.revision >= 4 ? block.readU8(4) : 0;
	const verticalOffsets = extractBits(offsets, 0, 2);
	const horizontalOffsets = extractBits(offsets, 2, 2);
	const maxPixelClock = block.readU8(9) * 10_000_000;

	return {
		verticalRate: {
			min: block.readU8(5) + (verticalOffsets === 0b11 ? 255 : 0),
			max: block.readU8(6) + (isBitSet(verticalOffsets, 1) ? 255 : 0)
		},
		horizontalRate: {
			min: (block.readU8(7) + (horizontalOffsets === 0b11 ? 255 : 0)) * 1000,
			max: (block.readU8(8) + (isBitSet(horizontalOffsets, 1) ? 255 : 0)) * 1000
		},
		maxPixelClock,
		secondaryTiming: decodeSecondaryTiming(block, maxPixelClock)
	};
}

/**
 * Color point descriptor (tag 0xFB): up to two white points; index 0 marks an empty slot
 */
export function decodeColorPoints(block: BinaryReader): WhitePoint[] {
	const points: WhitePoint[] = [];

	for (const offset of [PAYLOAD_OFFSET, PAYLOAD_OFFSET + 5]) {
		const index = block.readU8(offset);
		if (index === 0) {
			continue;
		}
		const lowBits = block.readU8(offset + 1);
		points.push({
			index,
			x: decodeCoordinate(block.readU8(offset + 2), extractBits(lowBits, 2, 2)),
			y: decodeCoordinate(block.readU8(offset + 3), extractBits(lowBits, 0, 2)),
			gamma: decodeGamma(block.readU8(offset + 4))
		});
	}

	return points;
}

export function decodeMonitorDescriptor(block: BinaryReader, context: DecodeContext): MonitorDescriptor {
	const tag = block.readU8(TAG_OFFSET);
	const payload = (): Uint8Array => block.readBytes(PAYLOAD_OFFSET, DESCRIPTOR_PAYLOAD_SIZE);

	switch (tag) {
		case TAG_SERIAL_NUMBER:
			return { kind: 'serialNumber', text: decodeDescriptorText(payload(), context.logger) };
		case TAG_MONITOR_NAME:
			return { kind: 'monitorName', text: decodeDescriptorText(payload(), context.logger) };
		case TAG_RANGE_LIMITS:
			return { kind: 'rangeLimits', ...decodeRangeLimits(block, context) };
		case TAG_COLOR_POINT:
			return { kind: 'colorPoint', whitePoints: decodeColorPoints(block) };
		case TAG_STANDARD_TIMINGS:
			return {
				kind: 'standardTimings',
				timings: decodeStandardTimingList(block, PAYLOAD_OFFSET, 6, context)
			};
		case TAG_UNUSED:
			return { kind: 'unused' };
		default:
			return { kind: 'manufacturerDefined', tag, data: payload() };
	}
}
