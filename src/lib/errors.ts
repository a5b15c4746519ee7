/**
 * Error kinds reported by the pattern core
 * Every message carries its code prefix, e.g. "ERROR-ST-02: ..."
 */

export type StitchErrorCode =
    | "ERROR-ST-01"
    | "ERROR-ST-02"
    | "ERROR-ST-03"
    | "ERROR-ST-04"
    | "ERROR-ST-05"
    | "ERROR-ST-06";

export class StitchError extends Error {
    readonly code: StitchErrorCode;

    constructor(code: StitchErrorCode, message: string, options?: { cause?: unknown }) {
        super(`${code}: ${message}`, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Unreadable, empty or malformed image input
 */
export class ImageDecodeError extends StitchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("ERROR-ST-01", message, options);
    }
}

/**
 * Requested grid dimensions out of bounds
 */
export class SizeError extends StitchError {
    constructor(message: string) {
        super("ERROR-ST-02", message);
    }
}

/**
 * Row, column or step index out of bounds
 */
export class IndexError extends StitchError {
    constructor(message: string) {
        super("ERROR-ST-03", message);
    }
}

/**
 * Color id absent from the palette a grid is allowed to use
 */
export class PaletteMismatchError extends StitchError {
    constructor(message: string) {
        super("ERROR-ST-04", message);
    }
}

export class PaletteLoadError extends StitchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("ERROR-ST-05", message, options);
    }
}

/**
 * Session action not accepted in the current state
 */
export class SessionStateError extends StitchError {
    constructor(message: string) {
        super("ERROR-ST-06", message);
    }
}

export function isStitchError(error: unknown): error is StitchError {
    return error instanceof StitchError;
}
