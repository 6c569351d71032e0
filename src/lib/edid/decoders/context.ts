import type { EdidLogger } from '../types/index.js';

/**
 * State threaded through the region decoders of one parse
 */
export interface DecodeContext {
	/** EDID revision (byte 19); several encodings changed in 1.3 and 1.4 */
	readonly revision: number;
	readonly logger: EdidLogger;
}
