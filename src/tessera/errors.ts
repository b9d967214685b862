export class TesseraError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'TesseraError';
    }
}

/** Malformed extent/unit/overlap or option value. */
export class InvalidParameterError extends TesseraError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidParameterError';
    }
}

export class UnsupportedModeError extends TesseraError {
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedModeError';
    }
}

/** Units or axes imply different scale factors. */
export class InconsistentScaleError extends TesseraError {
    constructor(message: string) {
        super(message);
        this.name = 'InconsistentScaleError';
    }
}

export class MissingParameterError extends TesseraError {
    constructor(message: string) {
        super(message);
        this.name = 'MissingParameterError';
    }
}

/** No metadata and no override for an axis. */
export class AmbiguousAxisError extends TesseraError {
    constructor(message: string) {
        super(message);
        this.name = 'AmbiguousAxisError';
    }
}

/** Unit geometry cannot be reconciled with the resolved plan. */
export class ShapeMismatchError extends TesseraError {
    constructor(message: string) {
        super(message);
        this.name = 'ShapeMismatchError';
    }
}

/** Encoded metadata record is truncated, corrupted or of an unknown version. */
export class MetadataError extends TesseraError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'MetadataError';
    }
}
