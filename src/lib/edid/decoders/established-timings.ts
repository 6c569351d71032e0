/**
 * Established timings bitmap (bytes 35-37)
 */

import { ESTABLISHED_TIMINGS_OFFSET } from '../constants.js';
import type { EstablishedTiming } from '../types/index.js';
import { isBitSet, type BinaryReader } from '../utils/struct.js';

/**
 * Modes in bitmap order: byte 35 bit 7 first, ending with byte 37 bit 7.
 * Byte 37 bits 6-0 are manufacturer reserved and have no entry.
 */
export const ESTABLISHED_TIMINGS: readonly EstablishedTiming[] = [
	{ id: 'H720V400F70', width: 720, height: 400, refreshRate: 70, interlaced: false },
	{ id: 'H720V400F88', width: 720, height: 400, refreshRate: 88, interlaced: false },
	{ id: 'H640V480F60', width: 640, height: 480, refreshRate: 60, interlaced: false },
	{ id: 'H640V480F67', width: 640, height: 480, refreshRate: 67, interlaced: false },
	{ id: 'H640V480F72', width: 640, height: 480, refreshRate: 72, interlaced: false },
	{ id: 'H640V480F75', width: 640, height: 480, refreshRate: 75, interlaced: false },
	{ id: 'H800V600F56', width: 800, height: 600, refreshRate: 56, interlaced: false },
	{ id: 'H800V600F60', width: 800, height: 600, refreshRate: 60, interlaced: false },
	{ id: 'H800V600F72', width: 800, height: 600, refreshRate: 72, interlaced: false },
	{ id: 'H800V600F75', width: 800, height: 600, refreshRate: 75, interlaced: false },
	{ id: 'H832V624F75', width: 832, height: 624, refreshRate: 75, interlaced: false },
	{ id: 'H1024V768F87', width: 1024, height: 768, refreshRate: 87, interlaced: true },
	{ id: 'H1024V768F60', width: 1024, height: 768, refreshRate: 60, interlaced: false },
	{ id: 'H1024V768F70', width: 1024, height: 768, refreshRate: 70, interlaced: false },
	{ id: 'H1024V768F75', width: 1024, height: 768, refreshRate: 75, interlaced: false },
	{ id: 'H1280V1024F75', width: 1280, height: 1024, refreshRate: 75, interlaced: false },
	{ id: 'H1152V870F75', width: 1152, height: 870, refreshRate: 75, interlaced: false }
];

export function decodeEstablishedTimings(reader: BinaryReader): EstablishedTiming[] {
	const timings: EstablishedTiming[] = [];

	ESTABLISHED_TIMINGS.forEach((timing, position) => {
		const byte = reader.readU8(ESTABLISHED_TIMINGS_OFFSET + Math.floor(position / 8));
		if (isBitSet(byte, 7 - (position % 8))) {
			timings.push({ ...timing });
		}
	});

	return timings;
}
