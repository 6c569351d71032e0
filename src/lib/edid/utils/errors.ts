/**
 * Error hierarchy for EDID parsing.
 * Each subclass carries a stable `code` for programmatic handling.
 */

export type EdidErrorCode = 'EDID_READ' | 'EDID_TRUNCATED' | 'EDID_FORMAT' | 'EDID_CHECKSUM';

export class EdidError extends Error {
	constructor(
		message: string,
		public readonly code: EdidErrorCode,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'EdidError';
	}
}

/**
 * The byte source itself failed
 */
export class EdidReadError extends EdidError {
	constructor(cause: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause);
		super(`Failed to read EDID data: ${detail}`, 'EDID_READ', { cause });
		this.name = 'EdidReadError';
	}
}

/**
 * Fewer bytes were available than a full block needs
 */
export class EdidTruncatedError extends EdidError {
	constructor(
		public readonly expected: number,
		public readonly received: number
	) {
		super(`Unexpectedly out of data: expected ${expected} bytes, got ${received}`, 'EDID_TRUNCATED');
		this.name = 'EdidTruncatedError';
	}
}

/**
 * The fixed header pattern does not match
 */
export class EdidFormatError extends EdidError {
	constructor(detail: string) {
		super(detail, 'EDID_FORMAT');
		this.name = 'EdidFormatError';
	}
}

/**
 * The block's bytes do not sum to zero modulo 256
 */
export class EdidChecksumError extends EdidError {
	constructor(
		public readonly sum: number,
		public readonly stored: number
	) {
		super(
			`Invalid checksum: block sums to 0x${sum.toString(16).padStart(2, '0')} (stored byte 0x${stored.toString(16).padStart(2, '0')})`,
			'EDID_CHECKSUM'
		);
		this.name = 'EdidChecksumError';
	}
}
