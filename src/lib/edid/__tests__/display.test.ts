/**
 * Tests for display parameter decoding
 */

import { describe, it, expect } from 'vitest';
import {
	decodeDisplayParameters,
	decodeDpmsFeatures,
	decodeGamma,
	decodeMaxSize,
	decodeVideoInput
} from '../decoders/display.js';
import { silentLogger } from '../utils/logger.js';
import { BinaryReader } from '../utils/struct.js';
import { EdidBuilder, createRecordingLogger } from './edid-builder.js';

const rev3 = { revision: 3, logger: silentLogger };
const rev4 = { revision: 4, logger: silentLogger };

describe('decodeVideoInput', () => {
	it('should decode analog sync flags by bit position', () => {
		expect(decodeVideoInput(0b0_01_1_1000, rev3)).toEqual({
			kind: 'analog',
			signalLevel: { high: 0.714, low: 0.286 },
			setupExpected: true,
			sync: { separate: true, composite: false, syncOnGreen: false, serratedVsync: false }
		});
		expect(decodeVideoInput(0b0_11_0_0111, rev3)).toEqual({
			kind: 'analog',
			signalLevel: { high: 0.7, low: 0.0 },
			setupExpected: false,
			sync: { separate: false, composite: true, syncOnGreen: true, serratedVsync: true }
		});
	});

	it('should decode only the DFP flag before revision 4', () => {
		expect(decodeVideoInput(0x81, rev3)).toEqual({ kind: 'digital', dfpCompatible: true });
		expect(decodeVideoInput(0x80, rev3)).toEqual({ kind: 'digital', dfpCompatible: false });
	});

	it('should decode bit depth and interface from revision 4', () => {
		expect(decodeVideoInput(0xa5, rev4)).toEqual({
			kind: 'digital',
			dfpCompatible: true,
			colorBitDepth: 8,
			interface: 'displayPort'
		});
		expect(decodeVideoInput(0b1_011_0001, rev4)).toEqual({
			kind: 'digital',
			dfpCompatible: true,
			colorBitDepth: 10,
			interface: 'dvi'
		});
	});

	it('should decode reserved codes into reserved arms and warn', () => {
		const logger = createRecordingLogger();
		expect(decodeVideoInput(0b1_111_1001, { revision: 4, logger })).toEqual({
			kind: 'digital',
			dfpCompatible: true,
			colorBitDepth: 'reserved',
			interface: 'reserved'
		});
		expect(logger.warnings).toEqual([
			'Video input byte 0xf9 uses a reserved bit depth or interface code'
		]);
	});
});

describe('decodeMaxSize', () => {
	it('should be absent when both bytes are zero', () => {
		expect(decodeMaxSize(0, 0, rev3)).toBeUndefined();
		expect(decodeMaxSize(0, 0, rev4)).toBeUndefined();
	});

	it('should decode physical size in centimetres', () => {
		expect(decodeMaxSize(60, 34, rev4)).toEqual({ kind: 'physical', width: 60, height: 34 });
	});

	it('should decode a landscape aspect ratio from revision 4', () => {
		// 16:9 is stored as 79: (79 + 99) / 100 = 1.78
		expect(decodeMaxSize(79, 0, rev4)).toEqual({
			kind: 'aspectRatio',
			orientation: 'landscape',
			ratio: 1.78
		});
	});

	it('should decode a portrait aspect ratio from revision 4', () => {
		const size = decodeMaxSize(0, 79, rev4);
		expect(size?.kind).toBe('aspectRatio');
		if (size?.kind === 'aspectRatio') {
			expect(size.orientation).toBe('portrait');
			expect(size.ratio).toBeCloseTo(100 / 178, 10);
		}
	});

	it('should treat a single zero byte as absent before revision 4', () => {
		expect(decodeMaxSize(79, 0, rev3)).toBeUndefined();
		expect(decodeMaxSize(0, 79, rev3)).toBeUndefined();
	});
});

describe('decodeGamma', () => {
	it('should map 0xFF to an absent value, not 2.55', () => {
		expect(decodeGamma(0xff)).toBeUndefined();
	});

	it('should scale other values', () => {
		expect(decodeGamma(120)).toBeCloseTo(2.2, 10);
		expect(decodeGamma(0)).toBe(1);
		expect(decodeGamma(254)).toBeCloseTo(3.54, 10);
	});
});

describe('decodeDpmsFeatures', () => {
	it('should decode every flag', () => {
		expect(decodeDpmsFeatures(0b1110_1111)).toEqual({
			standbySupported: true,
			suspendSupported: true,
			lowPowerSupported: true,
			displayType: 'rgb',
			defaultSrgb: true,
			preferredTimingMode: true,
			defaultGtfSupported: true
		});
	});

	it('should decode all display type codes', () => {
		expect(decodeDpmsFeatures(0b000_00_000).displayType).toBe('monochrome');
		expect(decodeDpmsFeatures(0b000_01_000).displayType).toBe('rgb');
		expect(decodeDpmsFeatures(0b000_10_000).displayType).toBe('nonRgb');
		expect(decodeDpmsFeatures(0b000_11_000).displayType).toBe('undefined');
	});
});

describe('decodeDisplayParameters', () => {
	it('should read bytes 20-24', () => {
		const block = new EdidBuilder().set(20, [0x80, 0, 0, 0xff, 0x02]).revision(3).build();
		expect(decodeDisplayParameters(new BinaryReader(block), rev3)).toEqual({
			input: { kind: 'digital', dfpCompatible: false },
			maxSize: undefined,
			gamma: undefined,
			dpms: {
				standbySupported: false,
				suspendSupported: false,
				lowPowerSupported: false,
				displayType: 'monochrome',
				defaultSrgb: false,
				preferredTimingMode: true,
				defaultGtfSupported: false
			}
		});
	});
});
