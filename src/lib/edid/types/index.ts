/**
 * Type definitions for the EDID decoder
 * Every value is built once per parse and never mutated afterwards
 */

/**
 * Decoded EDID 1.x base block
 */
export interface Edid {
	/** Manufacturer and product identification */
	readonly product: ProductInformation;
	/** EDID structure version */
	readonly version: Version;
	/** Basic display parameters and features */
	readonly display: DisplayParameters;
	/** Chromaticity of the primaries and white points */
	readonly color: ColorCharacteristics;
	/** Supported video modes */
	readonly timings: Timings;
	/** Non-timing 18-byte blocks, in block order */
	readonly descriptors: readonly MonitorDescriptor[];
	/** Number of 128-byte extension blocks declared after the base block */
	readonly extensionCount: number;
	/** Stored checksum byte */
	readonly checksum: number;
}

/**
 * Manufacturer and product identification
 */
export interface ProductInformation {
	/** Three-letter PNP ID (e.g., "APP") */
	readonly manufacturerId: string;
	readonly productCode: number;
	readonly serialNumber: number;
	readonly manufactureDate: ManufactureDate;
}

/**
 * Week and year of manufacture.
 * Week 0 means unspecified and week 255 marks `year` as a model year.
 */
export interface ManufactureDate {
	readonly week: number;
	readonly year: number;
}

/**
 * EDID structure version, e.g. 1.4
 */
export interface Version {
	readonly version: number;
	readonly revision: number;
}

/**
 * Basic display parameters (bytes 20-24)
 */
export interface DisplayParameters {
	readonly input: VideoInput;
	/** Physical size or aspect ratio; absent when both size bytes are zero */
	readonly maxSize: MaxSize | undefined;
	/** Transfer characteristic; absent when the raw byte is 0xFF */
	readonly gamma: number | undefined;
	readonly dpms: DpmsFeatures;
}

/**
 * Video input definition
 */
export type VideoInput = AnalogInput | DigitalInput;

export interface AnalogInput {
	readonly kind: 'analog';
	readonly signalLevel: SignalLevel;
	/** Blank-to-black setup (pedestal) expected */
	readonly setupExpected: boolean;
	readonly sync: SupportedSync;
}

export interface DigitalInput {
	readonly kind: 'digital';
	/** VESA DFP 1.x compatible (bit 0) */
	readonly dfpCompatible: boolean;
	/** Bits per primary color; revision 4 and later only */
	readonly colorBitDepth?: ColorBitDepth;
	/** Digital interface standard; revision 4 and later only */
	readonly interface?: DigitalInterface;
}

export type ColorBitDepth = 'undefined' | 6 | 8 | 10 | 12 | 14 | 16 | 'reserved';

export type DigitalInterface =
	| 'undefined'
	| 'dvi'
	| 'hdmiA'
	| 'hdmiB'
	| 'mddi'
	| 'displayPort'
	| 'reserved';

/**
 * Video white and sync levels, in volts relative to blank
 */
export interface SignalLevel {
	readonly high: number;
	readonly low: number;
}

/**
 * Sync signal types accepted by an analog display
 */
export interface SupportedSync {
	readonly separate: boolean;
	/** Composite sync on the horizontal sync line */
	readonly composite: boolean;
	readonly syncOnGreen: boolean;
	/** VSync pulse must be serrated when composite sync or sync on green is used */
	readonly serratedVsync: boolean;
}

/**
 * Image size in centimetres
 */
export interface ImageSize {
	readonly width: number;
	readonly height: number;
}

export type MaxSize =
	| ({ readonly kind: 'physical' } & ImageSize)
	| {
			readonly kind: 'aspectRatio';
			readonly orientation: 'landscape' | 'portrait';
			/** Width divided by height */
			readonly ratio: number;
	  };

export type DisplayType = 'monochrome' | 'rgb' | 'nonRgb' | 'undefined';

/**
 * Feature support flags (byte 24)
 */
export interface DpmsFeatures {
	readonly standbySupported: boolean;
	readonly suspendSupported: boolean;
	/** Active-off / very low power mode */
	readonly lowPowerSupported: boolean;
	readonly displayType: DisplayType;
	readonly defaultSrgb: boolean;
	/** The first detailed timing is the preferred mode */
	readonly preferredTimingMode: boolean;
	readonly defaultGtfSupported: boolean;
}

/**
 * CIE 1931 xy coordinate
 */
export interface Chromaticity {
	readonly x: number;
	readonly y: number;
}

export interface ColorCharacteristics {
	readonly red: Chromaticity;
	readonly green: Chromaticity;
	readonly blue: Chromaticity;
	readonly white: Chromaticity;
	/** Extra white points declared by color point descriptors */
	readonly whitePoints: readonly WhitePoint[];
}

/**
 * White point from a color point descriptor (tag 0xFB)
 */
export interface WhitePoint extends Chromaticity {
	/** White point index number, 1 or above */
	readonly index: number;
	readonly gamma: number | undefined;
}

/**
 * Supported video modes
 */
export interface Timings {
	readonly establishedTimings: readonly EstablishedTiming[];
	readonly standardTimings: readonly StandardTiming[];
	/** If present and flagged in the features byte, the first entry is the preferred mode */
	readonly detailedTimings: readonly DetailedTiming[];
}

export type EstablishedTimingId =
	| 'H720V400F70'
	| 'H720V400F88'
	| 'H640V480F60'
	| 'H640V480F67'
	| 'H640V480F72'
	| 'H640V480F75'
	| 'H800V600F56'
	| 'H800V600F60'
	| 'H800V600F72'
	| 'H800V600F75'
	| 'H832V624F75'
	| 'H1024V768F87'
	| 'H1024V768F60'
	| 'H1024V768F70'
	| 'H1024V768F75'
	| 'H1280V1024F75'
	| 'H1152V870F75';

/**
 * Legacy video mode from the established timings bitmap
 */
export interface EstablishedTiming {
	readonly id: EstablishedTimingId;
	readonly width: number;
	readonly height: number;
	readonly refreshRate: number;
	readonly interlaced: boolean;
}

export type AspectRatio = '1:1' | '16:10' | '4:3' | '5:4' | '16:9';

/**
 * Two-byte standard timing; the remaining parameters follow from GTF/CVT
 */
export interface StandardTiming {
	readonly horizontalResolution: number;
	readonly verticalResolution: number;
	readonly aspectRatio: AspectRatio;
	/** Field refresh rate in Hz */
	readonly refreshRate: number;
}

export type StereoMode =
	| 'fieldSequentialRight'
	| 'fieldSequentialLeft'
	| 'interleavedRightEven'
	| 'interleavedLeftEven'
	| 'interleaved4Way'
	| 'sideBySide';

export type SyncPolarity = 'positive' | 'negative';

export type SyncType =
	| {
			readonly kind: 'analogComposite' | 'bipolarAnalogComposite';
			readonly serrated: boolean;
			/** Sync on all three RGB lines, otherwise on green only */
			readonly syncOnAllLines: boolean;
	  }
	| {
			readonly kind: 'digitalComposite';
			readonly serrated: boolean;
			readonly horizontal: SyncPolarity;
	  }
	| {
			readonly kind: 'separate';
			readonly horizontal: SyncPolarity;
			readonly vertical: SyncPolarity;
	  };

/**
 * Horizontal and vertical pair, in pixels and lines
 */
export interface Extent {
	readonly horizontal: number;
	readonly vertical: number;
}

/**
 * Detailed timing descriptor
 */
export interface DetailedTiming {
	/** Pixel clock in Hz */
	readonly pixelClock: number;
	readonly active: Extent;
	readonly blanking: Extent;
	readonly frontPorch: Extent;
	readonly syncLength: Extent;
	readonly backPorch: Extent;
	/** Addressable image size, in centimetres */
	readonly imageSize: ImageSize;
	readonly border: Extent;
	readonly interlaced: boolean;
	readonly stereo: StereoMode | undefined;
	readonly syncType: SyncType;
}

export type SecondaryTiming =
	| { readonly kind: 'defaultGtf' }
	| { readonly kind: 'rangeLimitsOnly' }
	| {
			readonly kind: 'secondaryGtf';
			/** Horizontal frequency from which the curve applies, in Hz */
			readonly startFrequency: number;
			readonly c: number;
			readonly m: number;
			readonly k: number;
			readonly j: number;
	  }
	| ({ readonly kind: 'cvt' } & CvtSupport)
	| { readonly kind: 'other'; readonly code: number; readonly data: Uint8Array };

/**
 * CVT support definition from a range limits descriptor
 */
export interface CvtSupport {
	/** e.g. 1.1 */
	readonly version: number;
	/** Maximum pixel clock after subtracting the extra precision, in Hz */
	readonly maxPixelClock: number;
	/** Maximum active pixels per line, 0 when unlimited */
	readonly maxActivePixels: number;
	readonly supportedAspectRatios: readonly CvtAspectRatio[];
	readonly preferredAspectRatio: CvtAspectRatio | 'reserved';
	readonly reducedBlanking: boolean;
	readonly standardBlanking: boolean;
	readonly scaling: {
		readonly horizontalShrink: boolean;
		readonly horizontalStretch: boolean;
		readonly verticalShrink: boolean;
		readonly verticalStretch: boolean;
	};
	readonly preferredRefreshRate: number;
}

export type CvtAspectRatio = '4:3' | '16:9' | '16:10' | '5:4' | '15:9';

/**
 * Display range limits (tag 0xFD)
 */
export interface RangeLimits {
	/** Vertical rate limits in Hz */
	readonly verticalRate: { readonly min: number; readonly max: number };
	/** Horizontal rate limits in Hz */
	readonly horizontalRate: { readonly min: number; readonly max: number };
	/** Maximum pixel clock in Hz */
	readonly maxPixelClock: number;
	readonly secondaryTiming: SecondaryTiming;
}

/**
 * Non-timing 18-byte block
 */
export type MonitorDescriptor =
	| { readonly kind: 'serialNumber'; readonly text: string }
	| { readonly kind: 'monitorName'; readonly text: string }
	| ({ readonly kind: 'rangeLimits' } & RangeLimits)
	| { readonly kind: 'colorPoint'; readonly whitePoints: readonly WhitePoint[] }
	| { readonly kind: 'standardTimings'; readonly timings: readonly StandardTiming[] }
	| { readonly kind: 'manufacturerDefined'; readonly tag: number; readonly data: Uint8Array }
	| { readonly kind: 'unused' };

/**
 * Logging sink; `console` satisfies it
 */
export type EdidLogger = Pick<Console, 'debug' | 'warn'>;

/**
 * Options accepted by the parser
 */
export interface EdidParseOptions {
	/** Reject blocks whose bytes do not sum to zero (default: true) */
	readonly verifyChecksum?: boolean;
	/** Receives warnings about reserved or out-of-range encodings (default: silent) */
	readonly logger?: EdidLogger;
}

/**
 * Base block plus the raw extension blocks that follow it
 */
export interface EdidWithExtensions {
	readonly edid: Edid;
	/** Raw 128-byte blocks, not interpreted */
	readonly extensions: readonly Uint8Array[];
}
