import type { EdidLogger } from '../types/index.js';

/**
 * Logger that drops everything; the default so parsing has no side effects
 */
export const silentLogger: EdidLogger = {
	debug: () => {},
	warn: () => {}
};
