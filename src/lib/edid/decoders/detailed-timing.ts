/**
 * Detailed timing descriptor (18-byte block with a non-zero pixel clock)
 *
 * Layout, relative to the block:
 *   0-1   pixel clock / 10 kHz (LE)
 *   2-4   horizontal active / blanking, 8+4 bits (high nibbles in byte 4)
 *   5-7   vertical active / blanking, 8+4 bits (high nibbles in byte 7)
 *   8-11  front porch and sync width: horizontal 8+2 bits, vertical 4+2 bits
 *   12-14 image size in mm, 8+4 bits
 *   15-16 border
 *   17    flags
 */

import type { DetailedTiming, StereoMode, SyncPolarity, SyncType } from '../types/index.js';
import { extractBits, isBitSet, joinBits, type BinaryReader } from '../utils/struct.js';

const PIXEL_CLOCK_UNIT = 10_000;

function polarity(flags: number, bit: number): SyncPolarity {
	return isBitSet(flags, bit) ? 'positive' : 'negative';
}

/**
 * Stereo mode from flag bits 6, 5 and 0; undefined when bits 6-5 are clear
 */
export function decodeStereoMode(flags: number): StereoMode | undefined {
	const mode = extractBits(flags, 5, 2);
	const bit0 = isBitSet(flags, 0);
	switch (mode) {
		case 0b00:
			return undefined;
		case 0b01:
			return bit0 ? 'interleavedRightEven' : 'fieldSequentialRight';
		case 0b10:
			return bit0 ? 'interleavedLeftEven' : 'fieldSequentialLeft';
		default:
			return bit0 ? 'sideBySide' : 'interleaved4Way';
	}
}

/**
 * Sync definition from flag bits 4-1; polarity only where the variant defines it
 */
export function decodeSyncType(flags: number): SyncType {
	switch (extractBits(flags, 3, 2)) {
		case 0b00:
		case 0b01:
			return {
				kind: isBitSet(flags, 3) ? 'bipolarAnalogComposite' : 'analogComposite',
				serrated: isBitSet(flags, 2),
				syncOnAllLines: isBitSet(flags, 1)
			};
		case 0b10:
			return {
				kind: 'digitalComposite',
				serrated: isBitSet(flags, 2),
				horizontal: polarity(flags, 1)
			};
		default:
			return {
				kind: 'separate',
				vertical: polarity(flags, 2),
				horizontal: polarity(flags, 1)
			};
	}
}

/**
 * A block is a detailed timing unless its pixel clock bytes are both zero
 */
export function isDetailedTimingBlock(block: BinaryReader): boolean {
	return block.readU16LE(0) !== 0;
}

export function decodeDetailedTiming(block: BinaryReader): DetailedTiming {
	const horizontalHigh = block.readU8(4);
	const verticalHigh = block.readU8(7);
	const syncLow = block.readU8(10);
	const syncHigh = block.readU8(11);
	const sizeHigh = block.readU8(14);
	const flags = block.readU8(17);

	const active = {
		horizontal: joinBits(extractBits(horizontalHigh, 4, 4), block.readU8(2), 8),
		vertical: joinBits(extractBits(verticalHigh, 4, 4), block.readU8(5), 8)
	};
	const blanking = {
		horizontal: joinBits(extractBits(horizontalHigh, 0, 4), block.readU8(3), 8),
		vertical: joinBits(extractBits(verticalHigh, 0, 4), block.readU8(6), 8)
	};
	const frontPorch = {
		horizontal: joinBits(extractBits(syncHigh, 6, 2), block.readU8(8), 8),
		vertical: joinBits(extractBits(syncHigh, 2, 2), extractBits(syncLow, 4, 4), 4)
	};
	const syncLength = {
		horizontal: joinBits(extractBits(syncHigh, 4, 2), block.readU8(9), 8),
		vertical: joinBits(extractBits(syncHigh, 0, 2), extractBits(syncLow, 0, 4), 4)
	};
	const imageWidthMm = joinBits(extractBits(sizeHigh, 4, 4), block.readU8(12), 8);
	const imageHeightMm = joinBits(extractBits(sizeHigh, 0, 4), block.readU8(13), 8);

	return {
		pixelClock: block.readU16LE(0) * PIXEL_CLOCK_UNIT,
		active,
		blanking,
		frontPorch,
		syncLength,
		// Can go negative on malformed blocks; kept as decoded
		backPorch: {
			horizontal: blanking.horizontal - frontPorch.horizontal - syncLength.horizontal,
			vertical: blanking.vertical - frontPorch.vertical - syncLength.vertical
		},
		imageSize: { width: imageWidthMm / 10, height: imageHeightMm / 10 },
		border: { horizontal: block.readU8(15), vertical: block.readU8(16) },
		interlaced: isBitSet(flags, 7),
		stereo: decodeStereoMode(flags),
		syncType: decodeSyncType(flags)
	};
}
