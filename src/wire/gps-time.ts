import { GPS_TIME_SIZE, GpsTimeLayout } from './format.js';
import { TruncatedBufferError } from './errors.js';
import { ViolationCode, type Violation, checkInteger, throwOnErrors, toResult } from './validation.js';

/**
 * Frame timestamp. `year` counts years since 2000, `day` is the day of the year (1-366).
 */
export interface GpsTime {
    readonly year: number;
    readonly day: number;
    readonly hour: number;
    readonly minute: number;
    readonly second: number;
    readonly millisecond: number;
    readonly microsecond: number;
    readonly nanosecond: number;
}

const GPS_TIME_RANGES: ReadonlyArray<[keyof GpsTime, number, number]> = [
    ['year', 0, 255],
    ['day', 1, 366],
    ['hour', 0, 23],
    ['minute', 0, 59],
    ['second', 0, 59],
    ['millisecond', 0, 999],
    ['microsecond', 0, 999],
    ['nanosecond', 0, 999],
];

export function validateGpsTime(time: GpsTime, path: string = 'timestamp'): Violation[] {
    const violations: Violation[] = [];
    if (time == null) {
        violations.push({
            code: ViolationCode.MISSING_FIELD,
            path,
            message: `${path} is required`,
            severity: 'error',
        });
        return violations;
    }
    for (const [field, min, max] of GPS_TIME_RANGES) {
        checkInteger(violations, `${path}.${field}`, time[field], min, max);
    }
    return violations;
}

export function writeGpsTime(view: DataView, at: number, time: GpsTime) {
    view.setUint8(at + GpsTimeLayout.YEAR, time.year);
    view.setUint16(at + GpsTimeLayout.DAY, time.day, true);
    view.setUint8(at + GpsTimeLayout.HOUR, time.hour);
    view.setUint8(at + GpsTimeLayout.MINUTE, time.minute);
    view.setUint8(at + GpsTimeLayout.SECOND, time.second);
    view.setUint16(at + GpsTimeLayout.MILLISECOND, time.millisecond, true);
    view.setUint16(at + GpsTimeLayout.MICROSECOND, time.microsecond, true);
    view.setUint16(at + GpsTimeLayout.NANOSECOND, time.nanosecond, true);
}

export function readGpsTime(view: DataView, at: number): GpsTime {
    return {
        year: view.getUint8(at + GpsTimeLayout.YEAR),
        day: view.getUint16(at + GpsTimeLayout.DAY, true),
        hour: view.getUint8(at + GpsTimeLayout.HOUR),
        minute: view.getUint8(at + GpsTimeLayout.MINUTE),
        second: view.getUint8(at + GpsTimeLayout.SECOND),
        millisecond: view.getUint16(at + GpsTimeLayout.MILLISECOND, true),
        microsecond: view.getUint16(at + GpsTimeLayout.MICROSECOND, true),
        nanosecond: view.getUint16(at + GpsTimeLayout.NANOSECOND, true),
    };
}

/**
 * Encodes the fixed 14-byte struct (12 value bytes, pad bytes after `year` and `second` are zero).
 * Out-of-range fields throw FieldRangeError.
 */
export function encodeGpsTime(time: GpsTime): Uint8Array {
    throwOnErrors(toResult(validateGpsTime(time)));
    const bytes = new Uint8Array(GPS_TIME_SIZE);
    writeGpsTime(new DataView(bytes.buffer), 0, time);
    return bytes;
}

export function decodeGpsTime(bytes: Uint8Array, offset: number = 0): GpsTime {
    if (offset < 0 || bytes.length - offset < GPS_TIME_SIZE) {
        throw new TruncatedBufferError(offset, GPS_TIME_SIZE, bytes.length, 'GpsTime');
    }
    return readGpsTime(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength), offset);
}

/**
 * UTC wall-clock time as a GpsTime. Sub-millisecond fields are zero.
 */
export function gpsTimeFromDate(date: Date): GpsTime {
    const year = date.getUTCFullYear();
    const startOfYear = Date.UTC(year, 0, 1);
    const startOfDay = Date.UTC(year, date.getUTCMonth(), date.getUTCDate());
    return {
        year: year - 2000,
        day: Math.round((startOfDay - startOfYear) / 86_400_000) + 1,
        hour: date.getUTCHours(),
        minute: date.getUTCMinutes(),
        second: date.getUTCSeconds(),
        millisecond: date.getUTCMilliseconds(),
        microsecond: 0,
        nanosecond: 0,
    };
}

/** Inverse of gpsTimeFromDate; microsecond and nanosecond are dropped. */
export function gpsTimeToDate(time: GpsTime): Date {
    return new Date(Date.UTC(2000 + time.year, 0, time.day, time.hour, time.minute, time.second, time.millisecond));
}
