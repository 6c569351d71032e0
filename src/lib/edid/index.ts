/**
 * EDID decoder
 *
 * Decodes the VESA EDID 1.x 128-byte base block into typed values.
 * Byte acquisition (DDC/I2C, OS APIs, files) is left to the caller.
 *
 * @module edid
 */

// Types
export * from './types/index.js';

// Utilities
export * from './utils/struct.js';
export * from './utils/text.js';
export * from './utils/errors.js';
export { bufferSource, readExact, type ByteSource } from './utils/byte-source.js';
export { silentLogger } from './utils/logger.js';
export * from './constants.js';

// Region decoders
export { validateHeader, decodeVersion } from './decoders/header.js';
export {
	decodeManufacturerId,
	encodeManufacturerId,
	decodeProductInformation
} from './decoders/product.js';
export {
	decodeDisplayParameters,
	decodeVideoInput,
	decodeMaxSize,
	decodeGamma,
	decodeDpmsFeatures
} from './decoders/display.js';
export { decodeColorCharacteristics, decodeCoordinate } from './decoders/color.js';
export { ESTABLISHED_TIMINGS, decodeEstablishedTimings } from './decoders/established-timings.js';
export {
	decodeAspectRatio,
	decodeStandardTiming,
	decodeStandardTimings,
	isUnusedStandardTiming
} from './decoders/standard-timings.js';
export {
	decodeDetailedTiming,
	decodeStereoMode,
	decodeSyncType,
	isDetailedTimingBlock
} from './decoders/detailed-timing.js';
export { decodeMonitorDescriptor, decodeRangeLimits, decodeColorPoints } from './decoders/descriptors.js';
export { checksumOf, validateChecksum, readExtensionCount } from './decoders/checksum.js';
export type { DecodeContext } from './decoders/context.js';

// Extractor
export {
	EdidExtractor,
	decodeEdidBlock,
	parseEdid,
	DEFAULT_PARSE_OPTIONS,
	type EdidInput,
	type ResolvedParseOptions
} from './extractors/edid-extractor.js';
