import { EVENT_LIST_IDENTIFIER, EventListSlot, HEADER_SIZE, U16_MAX, U32_MAX, U8_MAX } from './format.js';
import {
    ByteWriter, finishRoot, offsetField, patchOffset, writeHeader, writeTable, writeU16Vector, writeU32Vector
} from './builder.js';
import { WireReader, peekIdentifier } from './reader.js';
import { BadIdentifierError, LengthMismatchError, TruncatedBufferError } from './errors.js';
import { type FrameMetadata, readFrameMetadata, validateFrameMetadata, writeFrameMetadata } from './frame-metadata.js';
import {
    ViolationCode, type ValidationResult, type Violation, checkInteger, checkSequence, throwOnErrors, toResult
} from './validation.js';
import { type DecodeOptions, resolveDecodeOptions } from './types.js';

/**
 * Event-mode digitizer output. Index i of `time`, `voltage` and `channel` together describe
 * one detected event.
 */
export interface EventListMessage {
    readonly digitizerId: number;
    readonly metadata: FrameMetadata;
    /** Nanoseconds since frame start. */
    readonly time: Uint32Array;
    readonly voltage: Uint16Array;
    /** Facility channel numbers, not positional indices. */
    readonly channel: Uint32Array;
}

export type EventListInput = {
    readonly digitizerId: number;
    readonly metadata: FrameMetadata;
    readonly time: ArrayLike<number>;
    readonly voltage: ArrayLike<number>;
    readonly channel: ArrayLike<number>;
};

const EVENT_LIST_SLOTS = 5;

function lengthsOf(message: EventListInput): Record<string, number> | null {
    if (message.time == null || message.voltage == null || message.channel == null) return null;
    return { time: message.time.length, voltage: message.voltage.length, channel: message.channel.length };
}

function lengthsAgree(lengths: Record<string, number>): boolean {
    return lengths.time === lengths.voltage && lengths.voltage === lengths.channel;
}

export function validateEventList(message: EventListInput): ValidationResult {
    const violations: Violation[] = [];
    checkInteger(violations, 'digitizerId', message.digitizerId, 0, U8_MAX);
    violations.push(...validateFrameMetadata(message.metadata));

    const lengths = lengthsOf(message);
    if (lengths !== null && !lengthsAgree(lengths)) {
        violations.push({
            code: ViolationCode.LENGTH_MISMATCH,
            path: 'time|voltage|channel',
            message: `time, voltage and channel must have equal length (${lengths.time}, ${lengths.voltage}, ${lengths.channel})`,
            severity: 'error',
            lengths,
        });
    }
    checkSequence(violations, 'time', message.time, U32_MAX);
    checkSequence(violations, 'voltage', message.voltage, U16_MAX);
    checkSequence(violations, 'channel', message.channel, U32_MAX);
    return toResult(violations);
}

export function encodeEventList(message: EventListInput): Uint8Array {
    // Parallel arrays are checked before anything else is inspected or written.
    const lengths = lengthsOf(message);
    if (lengths !== null && !lengthsAgree(lengths)) throw new LengthMismatchError(lengths);
    throwOnErrors(validateEventList(message));

    const count = message.time.length;
    const writer = new ByteWriter(128 + count * 10);
    writeHeader(writer, EVENT_LIST_IDENTIFIER);

    const root = writeTable(writer, EVENT_LIST_SLOTS, [
        { slot: EventListSlot.DIGITIZER_ID, kind: 'u8', value: message.digitizerId },
        { slot: EventListSlot.METADATA, kind: 'offset' },
        { slot: EventListSlot.TIME, kind: 'offset' },
        { slot: EventListSlot.VOLTAGE, kind: 'offset' },
        { slot: EventListSlot.CHANNEL, kind: 'offset' },
    ]);

    patchOffset(writer, offsetField(root, EventListSlot.METADATA), writeFrameMetadata(writer, message.metadata));
    patchOffset(writer, offsetField(root, EventListSlot.TIME), writeU32Vector(writer, message.time));
    patchOffset(writer, offsetField(root, EventListSlot.VOLTAGE), writeU16Vector(writer, message.voltage));
    patchOffset(writer, offsetField(root, EventListSlot.CHANNEL), writeU32Vector(writer, message.channel));

    return finishRoot(writer, root.position);
}

export function decodeEventList(bytes: Uint8Array, options: DecodeOptions = {}): EventListMessage {
    const opts = resolveDecodeOptions(options);
    const tag = peekIdentifier(bytes);
    if (tag === null) {
        throw new TruncatedBufferError(0, HEADER_SIZE, bytes.length, 'message header');
    }
    if (tag !== EVENT_LIST_IDENTIFIER) throw new BadIdentifierError(EVENT_LIST_IDENTIFIER, tag);

    const reader = new WireReader(bytes, opts.copy);
    const root = reader.rootTable('EventListMessage');
    const metadata = readFrameMetadata(root.requiredTable(EventListSlot.METADATA, 'metadata'));

    const time = root.u32Vector(EventListSlot.TIME, 'time');
    const voltage = root.u16Vector(EventListSlot.VOLTAGE, 'voltage');
    const channel = root.u32Vector(EventListSlot.CHANNEL, 'channel');
    const lengths = { time: time.length, voltage: voltage.length, channel: channel.length };
    if (!lengthsAgree(lengths)) throw new LengthMismatchError(lengths);

    return {
        digitizerId: root.u8(EventListSlot.DIGITIZER_ID, 'digitizerId'),
        metadata,
        time,
        voltage,
        channel,
    };
}
