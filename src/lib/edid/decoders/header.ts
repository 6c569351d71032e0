import { EDID_HEADER, REVISION_OFFSET, VERSION_OFFSET } from '../constants.js';
import type { Version } from '../types/index.js';
import { EdidFormatError } from '../utils/errors.js';
import type { BinaryReader } from '../utils/struct.js';

/**
 * Check the fixed 8-byte header pattern
 * @throws {EdidFormatError} if any byte differs
 */
export function validateHeader(reader: BinaryReader): void {
	const header = reader.readBytes(0, EDID_HEADER.length);
	const mismatch = header.findIndex((byte, i) => byte !== EDID_HEADER[i]);
	if (mismatch !== -1) {
		throw new EdidFormatError(
			`Invalid header: byte ${mismatch} is 0x${header[mismatch].toString(16).padStart(2, '0')}`
		);
	}
}

export function decodeVersion(reader: BinaryReader): Version {
	return {
		version: reader.readU8(VERSION_OFFSET),
		revision: reader.readU8(REVISION_OFFSET)
	};
}
