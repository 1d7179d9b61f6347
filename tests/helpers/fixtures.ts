import * as fc from 'fast-check';
import type { FrameMetadata } from '../../src/wire/frame-metadata.js';
import type { GpsTime } from '../../src/wire/gps-time.js';
import type { EventListMessage } from '../../src/wire/event-list.js';
import type { AnalogTraceMessage } from '../../src/wire/analog-trace.js';

export const SAMPLE_TIME: GpsTime = {
    year: 24,
    day: 300,
    hour: 13,
    minute: 45,
    second: 7,
    millisecond: 123,
    microsecond: 456,
    nanosecond: 789,
};

export function sampleMetadata(overrides: Partial<FrameMetadata> = {}): FrameMetadata {
    return {
        timestamp: SAMPLE_TIME,
        periodNumber: 7n,
        protonsPerPulse: 200,
        running: true,
        frameNumber: 42,
        vetoFlags: 0b101,
        ...overrides,
    };
}

export function sampleEventList(overrides: Partial<EventListMessage> = {}): EventListMessage {
    return {
        digitizerId: 3,
        metadata: sampleMetadata(),
        time: new Uint32Array([100, 250]),
        voltage: new Uint16Array([1000, 2000]),
        channel: new Uint32Array([5, 6]),
        ...overrides,
    };
}

export function sampleAnalogTrace(overrides: Partial<AnalogTraceMessage> = {}): AnalogTraceMessage {
    return {
        digitizerId: 9,
        metadata: sampleMetadata({ frameNumber: 43 }),
        sampleRate: 1_000_000_000n,
        channels: [
            { channel: 1, voltage: new Uint16Array([10, 20, 30]) },
            { channel: 2, voltage: new Uint16Array([40]) },
            { channel: 7, voltage: new Uint16Array([]) },
        ],
        ...overrides,
    };
}

/** Position of a table's vtable entry for `slot`. */
export function vtableEntry(bytes: Uint8Array, table: number, slot: number): number {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const vtable = table - view.getInt32(table, true);
    return vtable + 4 + slot * 2;
}

export function rootTable(bytes: Uint8Array): number {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true);
}

/** Absolute position of a table's field, following its vtable. */
export function fieldPosition(bytes: Uint8Array, table: number, slot: number): number {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return table + view.getUint16(vtableEntry(bytes, table, slot), true);
}

// --- arbitraries ---

export const u8 = fc.integer({ min: 0, max: 0xff });
export const u16 = fc.integer({ min: 0, max: 0xffff });
export const u32 = fc.tuple(u16, u16).map(([hi, lo]) => hi * 0x10000 + lo);
export const u64 = fc.bigInt({ min: 0n, max: 0xffffffffffffffffn });

export const gpsTimeArb: fc.Arbitrary<GpsTime> = fc.record({
    year: u8,
    day: fc.integer({ min: 1, max: 366 }),
    hour: fc.integer({ min: 0, max: 23 }),
    minute: fc.integer({ min: 0, max: 59 }),
    second: fc.integer({ min: 0, max: 59 }),
    millisecond: fc.integer({ min: 0, max: 999 }),
    microsecond: fc.integer({ min: 0, max: 999 }),
    nanosecond: fc.integer({ min: 0, max: 999 }),
});

export const frameMetadataArb: fc.Arbitrary<FrameMetadata> = fc.record({
    timestamp: gpsTimeArb,
    periodNumber: u64,
    protonsPerPulse: u8,
    running: fc.boolean(),
    frameNumber: u32,
    vetoFlags: u16,
});

export const eventListArb: fc.Arbitrary<EventListMessage> = fc.record({
    digitizerId: u8,
    metadata: frameMetadataArb,
    events: fc.array(fc.tuple(u32, u16, u32), { maxLength: 40 }),
}).map(({ digitizerId, metadata, events }) => ({
    digitizerId,
    metadata,
    time: Uint32Array.from(events.map(e => e[0])),
    voltage: Uint16Array.from(events.map(e => e[1])),
    channel: Uint32Array.from(events.map(e => e[2])),
}));

export const analogTraceArb: fc.Arbitrary<AnalogTraceMessage> = fc.record({
    digitizerId: u8,
    metadata: frameMetadataArb,
    sampleRate: fc.bigInt({ min: 1n, max: 0xffffffffffffffffn }),
    channels: fc.uniqueArray(
        fc.record({ channel: u32, samples: fc.array(u16, { maxLength: 30 }) }),
        { selector: c => c.channel, maxLength: 6 }
    ),
}).map(({ digitizerId, metadata, sampleRate, channels }) => ({
    digitizerId,
    metadata,
    sampleRate,
    channels: channels.map(c => ({ channel: c.channel, voltage: Uint16Array.from(c.samples) })),
}));
