import {
    DuplicateChannelError, FieldRangeError, LengthMismatchError, MissingRequiredFieldError,
    WireError, ZeroSampleRateError
} from './errors.js';

export enum ViolationCode {
    MISSING_FIELD = 'MISSING_FIELD',
    LENGTH_MISMATCH = 'LENGTH_MISMATCH',
    OUT_OF_RANGE = 'OUT_OF_RANGE',
    ZERO_SAMPLE_RATE = 'ZERO_SAMPLE_RATE',
    DUPLICATE_CHANNEL = 'DUPLICATE_CHANNEL',
}

export interface Violation {
    code: ViolationCode;
    /** Dotted path to the offending field, e.g. `metadata.timestamp.day` or `channels[2].channel`. */
    path: string;
    message: string;
    severity: 'error' | 'warning';
    /** Sequence lengths, for LENGTH_MISMATCH. */
    lengths?: Record<string, number>;
    /** Repeated channel number, for DUPLICATE_CHANNEL. */
    channel?: number;
}

export interface ValidationResult {
    /** True when no violation has `error` severity. Warnings may still be present. */
    ok: boolean;
    violations: Violation[];
}

export function toResult(violations: Violation[]): ValidationResult {
    return { ok: violations.every(v => v.severity !== 'error'), violations };
}

export function checkInteger(violations: Violation[], path: string, value: number, min: number, max: number) {
    if (!Number.isInteger(value) || value < min || value > max) {
        violations.push({
            code: ViolationCode.OUT_OF_RANGE,
            path,
            message: `${path} must be an integer in [${min}, ${max}], got ${String(value)}`,
            severity: 'error',
        });
    }
}

export function checkBigInt(violations: Violation[], path: string, value: bigint, max: bigint) {
    if (typeof value !== 'bigint' || value < 0n || value > max) {
        violations.push({
            code: ViolationCode.OUT_OF_RANGE,
            path,
            message: `${path} must be a bigint in [0, ${max}], got ${String(value)}`,
            severity: 'error',
        });
    }
}

/**
 * Checks every element of a sequence, reporting only the first offender.
 */
export function checkSequence(violations: Violation[], path: string, values: ArrayLike<number>, max: number) {
    if (values == null) {
        violations.push({
            code: ViolationCode.MISSING_FIELD,
            path,
            message: `${path} is required`,
            severity: 'error',
        });
        return;
    }
    for (let i = 0; i < values.length; i++) {
        const v = values[i];
        if (!Number.isInteger(v) || v < 0 || v > max) {
            checkInteger(violations, `${path}[${i}]`, v, 0, max);
            return;
        }
    }
}

/**
 * Maps the first error-severity violation onto its error class.
 */
export function toError(violation: Violation): WireError {
    switch (violation.code) {
        case ViolationCode.MISSING_FIELD:
            return new MissingRequiredFieldError(violation.path);
        case ViolationCode.LENGTH_MISMATCH:
            return new LengthMismatchError(violation.lengths ?? {});
        case ViolationCode.ZERO_SAMPLE_RATE:
            return new ZeroSampleRateError();
        case ViolationCode.DUPLICATE_CHANNEL:
            return new DuplicateChannelError(violation.channel ?? -1);
        case ViolationCode.OUT_OF_RANGE:
            return new FieldRangeError(violation.path, violation.message);
    }
}

export function throwOnErrors(result: ValidationResult) {
    const first = result.violations.find(v => v.severity === 'error');
    if (first) throw toError(first);
}
