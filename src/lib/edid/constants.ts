/**
 * EDID 1.x base block layout
 */

export const EDID_BLOCK_SIZE = 128;
export const EDID_HEADER = new Uint8Array([0x00, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x00]);

// Byte offsets within the base block
export const MANUFACTURER_ID_OFFSET = 0x08;
export const PRODUCT_CODE_OFFSET = 0x0a;
export const SERIAL_NUMBER_OFFSET = 0x0c;
export const MANUFACTURE_WEEK_OFFSET = 0x10;
export const MANUFACTURE_YEAR_OFFSET = 0x11;
export const VERSION_OFFSET = 0x12;
export const REVISION_OFFSET = 0x13;
export const VIDEO_INPUT_OFFSET = 0x14;
export const MAX_SIZE_OFFSET = 0x15;
export const GAMMA_OFFSET = 0x17;
export const FEATURES_OFFSET = 0x18;
export const CHROMATICITY_OFFSET = 0x19;
export const ESTABLISHED_TIMINGS_OFFSET = 0x23;
export const STANDARD_TIMINGS_OFFSET = 0x26;
export const DESCRIPTOR_BLOCKS_OFFSET = 0x36;
export const EXTENSION_COUNT_OFFSET = 0x7e;
export const CHECKSUM_OFFSET = 0x7f;

export const STANDARD_TIMING_COUNT = 8;
export const DESCRIPTOR_BLOCK_SIZE = 18;
export const DESCRIPTOR_BLOCK_COUNT = 4;
/** Payload bytes of a monitor descriptor (block bytes 5-17) */
export const DESCRIPTOR_PAYLOAD_SIZE = 13;

export const YEAR_BASE = 1990;
/** Standard timing slot filler */
export const UNUSED_STANDARD_TIMING = 0x01;
/** Raw gamma value meaning "defined elsewhere" */
export const GAMMA_UNDEFINED = 0xff;

// Monitor descriptor tags
export const TAG_SERIAL_NUMBER = 0xff;
export const TAG_RANGE_LIMITS = 0xfd;
export const TAG_MONITOR_NAME = 0xfc;
export const TAG_COLOR_POINT = 0xfb;
export const TAG_STANDARD_TIMINGS = 0xfa;
export const TAG_UNUSED = 0x10;
