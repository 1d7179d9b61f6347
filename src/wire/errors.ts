export class WireError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'WireError';
    }
}

/**
 * The buffer carries a different (or no) format identifier. Safe to ignore or reroute.
 */
export class BadIdentifierError extends WireError {
    constructor(public readonly expected: string | null, public readonly actual: string | null) {
        super(expected === null
            ? `Unrecognized format identifier ${JSON.stringify(actual)}`
            : `Expected format identifier "${expected}", found ${JSON.stringify(actual)}`);
        this.name = 'BadIdentifierError';
    }
}

export class MissingRequiredFieldError extends WireError {
    constructor(public readonly field: string) {
        super(`Required field "${field}" is absent`);
        this.name = 'MissingRequiredFieldError';
    }
}

export class LengthMismatchError extends WireError {
    constructor(public readonly lengths: Readonly<Record<string, number>>) {
        const described = Object.entries(lengths).map(([k, v]) => `${k}=${v}`).join(', ');
        super(`Parallel sequences differ in length (${described})`);
        this.name = 'LengthMismatchError';
    }
}

export class TruncatedBufferError extends WireError {
    constructor(
        public readonly offset: number,
        public readonly needed: number,
        public readonly available: number,
        what: string
    ) {
        super(`Buffer truncated: ${what} needs ${needed} bytes at offset ${offset}, buffer is ${available} bytes`);
        this.name = 'TruncatedBufferError';
    }
}

/**
 * A table whose vtable cannot describe it, e.g. a vtable size that is odd or smaller than its header.
 */
export class MalformedTableError extends WireError {
    constructor(public readonly table: string, detail: string) {
        super(`${table}: ${detail}`);
        this.name = 'MalformedTableError';
    }
}

export class ZeroSampleRateError extends WireError {
    constructor() {
        super('Analog trace sample rate must be non-zero');
        this.name = 'ZeroSampleRateError';
    }
}

export class DuplicateChannelError extends WireError {
    constructor(public readonly channel: number) {
        super(`Channel ${channel} appears more than once`);
        this.name = 'DuplicateChannelError';
    }
}

export class FieldRangeError extends WireError {
    constructor(public readonly field: string, message: string) {
        super(message);
        this.name = 'FieldRangeError';
    }
}

export function isForeignBuffer(err: unknown): err is BadIdentifierError {
    return err instanceof BadIdentifierError;
}

/**
 * True for errors raised on buffers that claim to be ours but are malformed.
 */
export function isDataIntegrityError(err: unknown): err is WireError {
    return err instanceof WireError && !(err instanceof BadIdentifierError);
}
