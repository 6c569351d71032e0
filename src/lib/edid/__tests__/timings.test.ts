/**
 * Tests for established and standard timings
 */

import { describe, it, expect } from 'vitest';
import { decodeEstablishedTimings, ESTABLISHED_TIMINGS } from '../decoders/established-timings.js';
import {
	decodeAspectRatio,
	decodeStandardTiming,
	decodeStandardTimings,
	isUnusedStandardTiming
} from '../decoders/standard-timings.js';
import { silentLogger } from '../utils/logger.js';
import { BinaryReader } from '../utils/struct.js';
import { EdidBuilder, createRecordingLogger } from './edid-builder.js';

const rev4 = { revision: 4, logger: silentLogger };

describe('decodeEstablishedTimings', () => {
	it('should list set bits in bitmap order', () => {
		const block = new EdidBuilder().set(35, [0b1000_0001, 0b0000_0010, 0b1111_1111]).build();
		const ids = decodeEstablishedTimings(new BinaryReader(block)).map((t) => t.id);

		expect(ids).toEqual(['H720V400F70', 'H800V600F60', 'H1024V768F75', 'H1152V870F75']);
	});

	it('should return every mode when all bits are set', () => {
		const block = new EdidBuilder().set(35, [0xff, 0xff, 0x80]).build();
		expect(decodeEstablishedTimings(new BinaryReader(block))).toEqual(ESTABLISHED_TIMINGS);
	});

	it('should return nothing for an empty bitmap', () => {
		expect(decodeEstablishedTimings(new BinaryReader(new EdidBuilder().build()))).toEqual([]);
	});

	it('should mark only 1024x768 at 87 Hz as interlaced', () => {
		const interlaced = ESTABLISHED_TIMINGS.filter((t) => t.interlaced).map((t) => t.id);
		expect(interlaced).toEqual(['H1024V768F87']);
	});
});

describe('decodeAspectRatio', () => {
	it('should depend on the revision for code 0', () => {
		expect(decodeAspectRatio(0, 2)).toBe('1:1');
		expect(decodeAspectRatio(0, 3)).toBe('16:10');
		expect(decodeAspectRatio(0, 4)).toBe('16:10');
	});

	it('should decode the remaining codes', () => {
		expect(decodeAspectRatio(1, 4)).toBe('4:3');
		expect(decodeAspectRatio(2, 4)).toBe('5:4');
		expect(decodeAspectRatio(3, 4)).toBe('16:9');
	});
});

describe('decodeStandardTiming', () => {
	it('should derive the vertical resolution from the aspect ratio', () => {
		expect(decodeStandardTiming(0xd1, 0xc0, rev4)).toEqual({
			horizontalResolution: 1920,
			verticalResolution: 1080,
			aspectRatio: '16:9',
			refreshRate: 60
		});
		expect(decodeStandardTiming(0x81, 0x80, rev4)).toEqual({
			horizontalResolution: 1280,
			verticalResolution: 1024,
			aspectRatio: '5:4',
			refreshRate: 60
		});
		expect(decodeStandardTiming(0x81, 0x0f, rev4)).toEqual({
			horizontalResolution: 1280,
			verticalResolution: 800,
			aspectRatio: '16:10',
			refreshRate: 75
		});
	});

	it('should decode code 0 as square before revision 3', () => {
		expect(decodeStandardTiming(0x81, 0x0f, { revision: 2, logger: silentLogger })).toEqual({
			horizontalResolution: 1280,
			verticalResolution: 1280,
			aspectRatio: '1:1',
			refreshRate: 75
		});
	});

	it('should warn about a zero horizontal byte but still decode it', () => {
		const logger = createRecordingLogger();
		expect(decodeStandardTiming(0x00, 0x40, { revision: 4, logger })).toEqual({
			horizontalResolution: 248,
			verticalResolution: 186,
			aspectRatio: '4:3',
			refreshRate: 60
		});
		expect(logger.warnings).toEqual([
			'Standard timing with horizontal byte 0x00 is invalid; decoding anyway'
		]);
	});
});

describe('decodeStandardTimings', () => {
	it('should recognise only the 0x01 0x01 pair as unused', () => {
		expect(isUnusedStandardTiming(0x01, 0x01)).toBe(true);
		expect(isUnusedStandardTiming(0x01, 0x02)).toBe(false);
		expect(isUnusedStandardTiming(0x00, 0x00)).toBe(false);
	});

	it('should skip unused slots and keep slot order', () => {
		const block = new EdidBuilder()
			.standardTiming(1, 0x61, 0x40)
			.standardTiming(4, 0xd1, 0xc0)
			.standardTiming(7, 0x01, 0x02)
			.build();

		expect(decodeStandardTimings(new BinaryReader(block), rev4)).toEqual([
			{ horizontalResolution: 1024, verticalResolution: 768, aspectRatio: '4:3', refreshRate: 60 },
			{ horizontalResolution: 1920, verticalResolution: 1080, aspectRatio: '16:9', refreshRate: 60 },
			{ horizontalResolution: 256, verticalResolution: 160, aspectRatio: '16:10', refreshRate: 62 }
		]);
	});

	it('should return nothing when every slot is unused', () => {
		expect(decodeStandardTimings(new BinaryReader(new EdidBuilder().build()), rev4)).toEqual([]);
	});
});
