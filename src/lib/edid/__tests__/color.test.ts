/**
 * Tests for chromaticity decoding
 */

import { describe, it, expect } from 'vitest';
import { decodeColorCharacteristics, decodeCoordinate } from '../decoders/color.js';
import { BinaryReader } from '../utils/struct.js';
import { EdidBuilder } from './edid-builder.js';

describe('decodeCoordinate', () => {
	it('should combine high and low bits into a 10-bit fraction', () => {
		expect(decodeCoordinate(0, 0)).toBe(0);
		expect(decodeCoordinate(0x80, 0)).toBe(0.5);
		expect(decodeCoordinate(0xff, 3)).toBe(1023 / 1024);
		expect(decodeCoordinate(0x00, 1)).toBe(1 / 1024);
	});
});

describe('decodeColorCharacteristics', () => {
	it('should pair each high byte with its low bits', () => {
		const block = new EdidBuilder()
			.set(25, [0b11_10_01_00, 0b00_00_00_00, 0xa0, 0x50, 0x4c, 0x9e, 0x26, 0x0f, 0x50, 0x54])
			.build();

		expect(decodeColorCharacteristics(new BinaryReader(block))).toEqual({
			red: { x: 643 / 1024, y: 322 / 1024 },
			green: { x: 305 / 1024, y: 632 / 1024 },
			blue: { x: 152 / 1024, y: 60 / 1024 },
			white: { x: 0.3125, y: 0.328125 },
			whitePoints: []
		});
	});

	it('should read blue and white low bits from byte 26', () => {
		const block = new EdidBuilder().set(25, [0x00, 0b01_10_11_01]).build();
		const color = decodeColorCharacteristics(new BinaryReader(block));

		expect(color.blue).toEqual({ x: 1 / 1024, y: 2 / 1024 });
		expect(color.white).toEqual({ x: 3 / 1024, y: 1 / 1024 });
		expect(color.red).toEqual({ x: 0, y: 0 });
	});
});
