/**
 * Basic display parameters and features (bytes 20-24)
 */

import {
	FEATURES_OFFSET,
	GAMMA_OFFSET,
	GAMMA_UNDEFINED,
	MAX_SIZE_OFFSET,
	VIDEO_INPUT_OFFSET
} from '../constants.js';
import type {
	ColorBitDepth,
	DigitalInterface,
	DisplayParameters,
	DisplayType,
	DpmsFeatures,
	MaxSize,
	SignalLevel,
	VideoInput
} from '../types/index.js';
import { extractBits, isBitSet, type BinaryReader } from '../utils/struct.js';
import type { DecodeContext } from './context.js';

const SIGNAL_LEVELS: readonly SignalLevel[] = [
	{ high: 0.7, low: 0.3 },
	{ high: 0.714, low: 0.286 },
	{ high: 1.0, low: 0.4 },
	{ high: 0.7, low: 0.0 }
];

const COLOR_BIT_DEPTHS: readonly ColorBitDepth[] = [
	'undefined',
	6,
	8,
	10,
	12,
	14,
	16,
	'reserved'
];

const DIGITAL_INTERFACES: readonly DigitalInterface[] = [
	'undefined',
	'dvi',
	'hdmiA',
	'hdmiB',
	'mddi',
	'displayPort'
];

const DISPLAY_TYPES: readonly DisplayType[] = ['monochrome', 'rgb', 'nonRgb', 'undefined'];

export function decodeVideoInput(value: number, context: DecodeContext): VideoInput {
	if (!isBitSet(value, 7)) {
		return {
			kind: 'analog',
			signalLevel: { ...SIGNAL_LEVELS[extractBits(value, 5, 2)] },
			setupExpected: isBitSet(value, 4),
			sync: {
				separate: isBitSet(value, 3),
				composite: isBitSet(value, 2),
				syncOnGreen: isBitSet(value, 1),
				serratedVsync: isBitSet(value, 0)
			}
		};
	}

	const dfpCompatible = isBitSet(value, 0);
	if (context.revision < 4) {
		return { kind: 'digital', dfpCompatible };
	}

	const colorBitDepth = COLOR_BIT_DEPTHS[extractBits(value, 4, 3)];
	const interfaceCode = extractBits(value, 0, 4);
	const digitalInterface = DIGITAL_INTERFACES[interfaceCode] ?? 'reserved';
	if (colorBitDepth === 'reserved' || digitalInterface === 'reserved') {
		context.logger.warn(
			`Video input byte 0x${value.toString(16)} uses a reserved bit depth or interface code`
		);
	}
	return { kind: 'digital', dfpCompatible, colorBitDepth, interface: digitalInterface };
}

/**
 * Decode the maximum image size bytes.
 * From revision 4 a single non-zero byte encodes an aspect ratio instead.
 */
export function decodeMaxSize(
	horizontal: number,
	vertical: number,
	context: DecodeContext
): MaxSize | undefined {
	if (horizontal !== 0 && vertical !== 0) {
		return { kind: 'physical', width: horizontal, height: vertical };
	}
	if (context.revision < 4 || (horizontal === 0 && vertical === 0)) {
		return undefined;
	}
	if (vertical === 0) {
		return { kind: 'aspectRatio', orientation: 'landscape', ratio: (horizontal + 99) / 100 };
	}
	return { kind: 'aspectRatio', orientation: 'portrait', ratio: 100 / (vertical + 99) };
}

export function decodeGamma(value: number): number | undefined {
	return value === GAMMA_UNDEFINED ? undefined : (value + 100) / 100;
}

export function decodeDpmsFeatures(value: number): DpmsFeatures {
	return {
		standbySupported: isBitSet(value, 7),
		suspendSupported: isBitSet(value, 6),
		lowPowerSupported: isBitSet(value, 5),
		displayType: DISPLAY_TYPES[extractBits(value, 3, 2)],
		defaultSrgb: isBitSet(value, 2),
		preferredTimingMode: isBitSet(value, 1),
		defaultGtfSupported: isBitSet(value, 0)
	};
}

export function decodeDisplayParameters(
	reader: BinaryReader,
	context: DecodeContext
): DisplayParameters {
	return {
		input: decodeVideoInput(reader.readU8(VIDEO_INPUT_OFFSET), context),
		maxSize: decodeMaxSize(
			reader.readU8(MAX_SIZE_OFFSET),
			reader.readU8(MAX_SIZE_OFFSET + 1),
			context
		),
		gamma: decodeGamma(reader.readU8(GAMMA_OFFSET)),
		dpms: decodeDpmsFeatures(reader.readU8(FEATURES_OFFSET))
	};
}
