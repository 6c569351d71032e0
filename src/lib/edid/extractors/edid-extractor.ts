/**
 * EDID Extractor - reads one base block from a byte source and decodes it region by region
 *
 * Decoding is all-or-nothing: any failure throws and no partial value escapes.
 */

import {
	DESCRIPTOR_BLOCK_COUNT,
	DESCRIPTOR_BLOCK_SIZE,
	DESCRIPTOR_BLOCKS_OFFSET,
	EDID_BLOCK_SIZE
} from '../constants.js';
import { checksumOf, readExtensionCount, validateChecksum } from '../decoders/checksum.js';
import { decodeColorCharacteristics } from '../decoders/color.js';
import type { DecodeContext } from '../decoders/context.js';
import { decodeMonitorDescriptor } from '../decoders/descriptors.js';
import { decodeDetailedTiming, isDetailedTimingBlock } from '../decoders/detailed-timing.js';
import { decodeDisplayParameters } from '../decoders/display.js';
import { decodeEstablishedTimings } from '../decoders/established-timings.js';
import { decodeVersion, validateHeader } from '../decoders/header.js';
import { decodeProductInformation } from '../decoders/product.js';
import { decodeStandardTimings } from '../decoders/standard-timings.js';
import type {
	DetailedTiming,
	Edid,
	EdidLogger,
	EdidParseOptions,
	EdidWithExtensions,
	MonitorDescriptor,
	StandardTiming,
	WhitePoint
} from '../types/index.js';
import { bufferSource, isByteSource, readExact, type ByteSource } from '../utils/byte-source.js';
import { EdidTruncatedError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import { BinaryReader } from '../utils/struct.js';

export interface ResolvedParseOptions {
	readonly verifyChecksum: boolean;
	readonly logger: EdidLogger;
}

export const DEFAULT_PARSE_OPTIONS: ResolvedParseOptions = {
	verifyChecksum: true,
	logger: silentLogger
};

export type EdidInput = ByteSource | Uint8Array;

function resolveOptions(options: EdidParseOptions): ResolvedParseOptions {
	return {
		verifyChecksum: options.verifyChecksum ?? DEFAULT_PARSE_OPTIONS.verifyChecksum,
		logger: options.logger ?? DEFAULT_PARSE_OPTIONS.logger
	};
}

function toSource(input: EdidInput): ByteSource {
	return isByteSource(input) ? input : bufferSource(input);
}

/**
 * Decode an in-memory base block. Bytes past the first 128 are ignored.
 * @throws {EdidTruncatedError} if fewer than 128 bytes are given
 * @throws {EdidFormatError} if the header pattern is wrong
 * @throws {EdidChecksumError} if the checksum fails and verification is on
 */
export function decodeEdidBlock(block: Uint8Array, options: EdidParseOptions = {}): Edid {
	const { verifyChecksum, logger } = resolveOptions(options);
	if (block.length < EDID_BLOCK_SIZE) {
		throw new EdidTruncatedError(EDID_BLOCK_SIZE, block.length);
	}

	const data = block.subarray(0, EDID_BLOCK_SIZE);
	const reader = new BinaryReader(data);

	validateHeader(reader);
	if (verifyChecksum) {
		validateChecksum(data);
	} else if (checksumOf(data) !== 0) {
		logger.warn('Checksum mismatch ignored');
	}

	const version = decodeVersion(reader);
	const context: DecodeContext = { revision: version.revision, logger };

	const product = decodeProductInformation(reader, context);
	const display = decodeDisplayParameters(reader, context);
	const color = decodeColorCharacteristics(reader);
	const establishedTimings = decodeEstablishedTimings(reader);
	const standardTimings: StandardTiming[] = decodeStandardTimings(reader, context);

	const detailedTimings: DetailedTiming[] = [];
	const descriptors: MonitorDescriptor[] = [];
	const whitePoints: WhitePoint[] = [];

	for (let i = 0; i < DESCRIPTOR_BLOCK_COUNT; i++) {
		const blockReader = reader.subReader(
			DESCRIPTOR_BLOCKS_OFFSET + i * DESCRIPTOR_BLOCK_SIZE,
			DESCRIPTOR_BLOCK_SIZE
		);
		if (isDetailedTimingBlock(blockReader)) {
			detailedTimings.push(decodeDetailedTiming(blockReader));
			continue;
		}

		const descriptor = decodeMonitorDescriptor(blockReader, context);
		descriptors.push(descriptor);
		// Descriptor-carried timings and white points join the main lists as copies
		if (descriptor.kind === 'standardTimings') {
			standardTimings.push(...descriptor.timings.map((timing) => ({ ...timing })));
		} else if (descriptor.kind === 'colorPoint') {
			whitePoints.push(...descriptor.whitePoints.map((point) => ({ ...point })));
		}
	}

	logger.debug(
		`Decoded EDID ${version.version}.${version.revision} for ${product.manufacturerId}: ` +
			`${detailedTimings.length} detailed timing(s), ${descriptors.length} descriptor(s)`
	);

	return {
		product,
		version,
		display,
		color: { ...color, whitePoints },
		timings: { establishedTimings, standardTimings, detailedTimings },
		descriptors,
		extensionCount: readExtensionCount(reader),
		checksum: data[data.length - 1]
	};
}

/**
 * Extractor class
 * Holds parse options; each call reads from the source it is given
 */
export class EdidExtractor {
	private readonly options: ResolvedParseOptions;

	constructor(options: EdidParseOptions = {}) {
		this.options = resolveOptions(options);
	}

	/**
	 * Read and decode the 128-byte base block
	 * @throws {EdidReadError} if the source fails
	 * @throws {EdidTruncatedError} if the source has fewer than 128 bytes
	 */
	extract(input: EdidInput): Edid {
		return this.extractFrom(toSource(input));
	}

	/**
	 * Decode the base block, then read the extension blocks it declares without interpreting them
	 */
	extractAll(input: EdidInput): EdidWithExtensions {
		const source = toSource(input);
		const edid = this.extractFrom(source);
		const extensions: Uint8Array[] = [];

		for (let i = 0; i < edid.extensionCount; i++) {
			extensions.push(readExact(source, EDID_BLOCK_SIZE));
		}

		return { edid, extensions };
	}

	private extractFrom(source: ByteSource): Edid {
		return decodeEdidBlock(readExact(source, EDID_BLOCK_SIZE), this.options);
	}
}

/**
 * Parse EDID data from a byte source or buffer
 */
export function parseEdid(input: EdidInput, options: EdidParseOptions = {}): Edid {
	return new EdidExtractor(options).extract(input);
}
