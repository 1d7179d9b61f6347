import { describe, it, expect } from 'vitest';
import {
    encodeEventList, decodeEventList, encodeAnalogTrace, decodeAnalogTrace, TruncatedBufferError, GPS_TIME_SIZE
} from '../../src/index.js';
import { sampleAnalogTrace, sampleEventList } from '../helpers/fixtures.js';

describe('Regression: truncated buffers', () => {
    it('fails below the GpsTime size', () => {
        const bytes = encodeEventList(sampleEventList()).slice(0, GPS_TIME_SIZE - 1);
        expect(() => decodeEventList(bytes)).toThrow(TruncatedBufferError);
    });

    it('fails before the identifier is complete', () => {
        expect(() => decodeEventList(new Uint8Array(0))).toThrow(TruncatedBufferError);
        expect(() => decodeAnalogTrace(encodeAnalogTrace(sampleAnalogTrace()).slice(0, 6))).toThrow(TruncatedBufferError);
    });

    it('throws TruncatedBufferError for every event list prefix', () => {
        const full = encodeEventList(sampleEventList());
        for (let i = 0; i < full.length; i++) {
            expect(() => decodeEventList(full.slice(0, i)), `prefix ${i}/${full.length}`).toThrow(TruncatedBufferError);
        }
    });

    it('throws TruncatedBufferError for every analog trace prefix', () => {
        const full = encodeAnalogTrace(sampleAnalogTrace({
            channels: [
                { channel: 1, voltage: new Uint16Array([10, 20, 30]) },
                { channel: 2, voltage: new Uint16Array([40]) },
            ],
        }));
        for (let i = 0; i < full.length; i++) {
            expect(() => decodeAnalogTrace(full.slice(0, i)), `prefix ${i}/${full.length}`).toThrow(TruncatedBufferError);
        }
    });

    it('reports where the read ran out', () => {
        const bytes = encodeEventList(sampleEventList()).slice(0, 30);
        try {
            decodeEventList(bytes);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(TruncatedBufferError);
            const e = err as TruncatedBufferError;
            expect([e.offset, e.needed, e.available]).toEqual([24, 21, 30]);
        }
    });

    it('rejects a vector length that runs past the end', () => {
        const bytes = encodeEventList(sampleEventList());
        new DataView(bytes.buffer).setUint32(124, 1000, true); // channel count
        expect(() => decodeEventList(bytes)).toThrow(TruncatedBufferError);
    });
});
