import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
    encodeEventList, decodeEventList, validateEventList, encodeAnalogTrace,
    LengthMismatchError, BadIdentifierError, FieldRangeError, MissingRequiredFieldError, ViolationCode
} from '../src/index.js';
import type { EventListInput, FrameMetadata } from '../src/index.js';
import { eventListArb, sampleAnalogTrace, sampleEventList, sampleMetadata } from './helpers/fixtures.js';

describe('EventList codec', () => {
    it('round-trips a message field for field', () => {
        const message = sampleEventList();
        expect(decodeEventList(encodeEventList(message))).toEqual(message);
    });

    it('round-trips arbitrary valid messages', () => {
        fc.assert(fc.property(eventListArb, (message) => {
            expect(decodeEventList(encodeEventList(message))).toEqual(message);
            expect(decodeEventList(encodeEventList(message), { copy: true })).toEqual(message);
        }), { numRuns: 200 });
    });

    it('round-trips an empty frame', () => {
        const message = sampleEventList({
            time: new Uint32Array(0),
            voltage: new Uint16Array(0),
            channel: new Uint32Array(0),
        });
        expect(decodeEventList(encodeEventList(message))).toEqual(message);
    });

    it('accepts plain number arrays on encode', () => {
        const decoded = decodeEventList(encodeEventList({
            digitizerId: 1,
            metadata: sampleMetadata(),
            time: [1, 2, 3],
            voltage: [4, 5, 6],
            channel: [7, 8, 9],
        }));
        expect(Array.from(decoded.time)).toEqual([1, 2, 3]);
        expect(Array.from(decoded.voltage)).toEqual([4, 5, 6]);
        expect(Array.from(decoded.channel)).toEqual([7, 8, 9]);
    });

    it('is deterministic', () => {
        expect(encodeEventList(sampleEventList())).toEqual(encodeEventList(sampleEventList()));
    });

    it('rejects parallel sequences of different lengths without producing a buffer', () => {
        let produced: Uint8Array | undefined;
        let caught: unknown;
        try {
            produced = encodeEventList({
                digitizerId: 1,
                metadata: sampleMetadata(),
                time: [1, 2],
                voltage: [10],
                channel: [5, 6],
            });
        } catch (err) {
            caught = err;
        }
        expect(produced).toBeUndefined();
        expect(caught).toBeInstanceOf(LengthMismatchError);
        expect((caught as LengthMismatchError).lengths).toEqual({ time: 2, voltage: 1, channel: 2 });
    });

    it('checks lengths before any other field', () => {
        expect(() => encodeEventList({
            digitizerId: 999,
            metadata: sampleMetadata(),
            time: [1],
            voltage: [],
            channel: [1],
        })).toThrow(LengthMismatchError);
    });

    it('rejects out-of-range scalars and samples', () => {
        expect(() => encodeEventList(sampleEventList({ digitizerId: 256 }))).toThrow(FieldRangeError);
        try {
            encodeEventList({ ...sampleEventList(), voltage: [70000, 1] });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(FieldRangeError);
            expect((err as FieldRangeError).field).toBe('voltage[0]');
        }
    });

    it('rejects a missing metadata object passed by untyped callers', () => {
        const input = { ...sampleEventList(), metadata: null } as unknown as EventListInput;
        expect(() => encodeEventList(input)).toThrow(MissingRequiredFieldError);
    });

    it('refuses an analog trace buffer', () => {
        try {
            decodeEventList(encodeAnalogTrace(sampleAnalogTrace()));
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(BadIdentifierError);
            expect((err as BadIdentifierError).expected).toBe('dev2');
            expect((err as BadIdentifierError).actual).toBe('dat2');
        }
    });
});

describe('EventList validation', () => {
    it('accepts a well-formed message', () => {
        expect(validateEventList(sampleEventList())).toEqual({ ok: true, violations: [] });
    });

    it('lists every violation', () => {
        const metadata: FrameMetadata = { ...sampleMetadata(), protonsPerPulse: 300, vetoFlags: -1 };
        const result = validateEventList({
            digitizerId: 1,
            metadata,
            time: [1, 2],
            voltage: [1],
            channel: [1, 2],
        });
        expect(result.ok).toBe(false);
        expect(result.violations.map(v => [v.code, v.path])).toEqual([
            [ViolationCode.OUT_OF_RANGE, 'metadata.protonsPerPulse'],
            [ViolationCode.OUT_OF_RANGE, 'metadata.vetoFlags'],
            [ViolationCode.LENGTH_MISMATCH, 'time|voltage|channel'],
        ]);
    });
});
