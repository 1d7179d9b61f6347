import {
    ANALOG_TRACE_IDENTIFIER, AnalogTraceSlot, ChannelTraceSlot, HEADER_SIZE, U16_MAX, U32_MAX, U64_MAX, U8_MAX
} from './format.js';
import {
    ByteWriter, finishRoot, offsetField, patchOffset, reserveOffsetVector, writeHeader, writeTable, writeU16Vector
} from './builder.js';
import { WireReader, peekIdentifier } from './reader.js';
import { BadIdentifierError, DuplicateChannelError, TruncatedBufferError } from './errors.js';
import { type FrameMetadata, readFrameMetadata, validateFrameMetadata, writeFrameMetadata } from './frame-metadata.js';
import {
    ViolationCode, type ValidationResult, type Violation, checkBigInt, checkInteger, checkSequence,
    throwOnErrors, toResult
} from './validation.js';
import {
    type AnalogTraceDecodeOptions, type AnalogTraceEncodeOptions, type ValidateOptions, type WireLogger,
    resolveChannelPolicy, resolveDecodeOptions
} from './types.js';

export interface ChannelTrace {
    readonly channel: number;
    /** Raw waveform samples. Length is independent per channel. */
    readonly voltage: Uint16Array;
}

/**
 * Waveform digitizer output: one trace per channel, all sampled at `sampleRate` Hz.
 */
export interface AnalogTraceMessage {
    readonly digitizerId: number;
    readonly metadata: FrameMetadata;
    readonly sampleRate: bigint;
    readonly channels: readonly ChannelTrace[];
}

export type ChannelTraceInput = {
    readonly channel: number;
    readonly voltage: ArrayLike<number>;
};

export type AnalogTraceInput = {
    readonly digitizerId: number;
    readonly metadata: FrameMetadata;
    readonly sampleRate: bigint;
    readonly channels: readonly ChannelTraceInput[];
};

const ANALOG_TRACE_SLOTS = 4;
const CHANNEL_TRACE_SLOTS = 2;

/** Channel numbers that occur more than once, in order of their first repeat. */
export function findDuplicateChannels(channels: readonly { channel: number }[]): number[] {
    const seen = new Set<number>();
    const repeated = new Set<number>();
    for (const { channel } of channels) {
        if (seen.has(channel)) repeated.add(channel);
        seen.add(channel);
    }
    return [...repeated];
}

export function validateAnalogTrace(message: AnalogTraceInput, options: ValidateOptions = {}): ValidationResult {
    const violations: Violation[] = [];
    checkInteger(violations, 'digitizerId', message.digitizerId, 0, U8_MAX);
    violations.push(...validateFrameMetadata(message.metadata));

    checkBigInt(violations, 'sampleRate', message.sampleRate, U64_MAX);
    if (message.sampleRate === 0n) {
        violations.push({
            code: ViolationCode.ZERO_SAMPLE_RATE,
            path: 'sampleRate',
            message: 'sampleRate must be non-zero',
            severity: 'error',
        });
    }

    if (message.channels == null) {
        violations.push({ code: ViolationCode.MISSING_FIELD, path: 'channels', message: 'channels is required', severity: 'error' });
        return toResult(violations);
    }

    message.channels.forEach((trace, i) => {
        checkInteger(violations, `channels[${i}].channel`, trace.channel, 0, U32_MAX);
        checkSequence(violations, `channels[${i}].voltage`, trace.voltage, U16_MAX);
    });

    for (const channel of findDuplicateChannels(message.channels)) {
        violations.push({
            code: ViolationCode.DUPLICATE_CHANNEL,
            path: 'channels',
            message: `channel ${channel} appears more than once`,
            severity: options.strict ? 'error' : 'warning',
            channel,
        });
    }
    return toResult(violations);
}

function warnDuplicates(channels: readonly { channel: number }[], strict: boolean, logger: WireLogger | null) {
    const duplicates = findDuplicateChannels(channels);
    if (duplicates.length === 0) return;
    if (strict) throw new DuplicateChannelError(duplicates[0]);
    for (const channel of duplicates) {
        logger?.warn?.(`AnalogTrace: channel ${channel} appears more than once`);
    }
}

export function encodeAnalogTrace(message: AnalogTraceInput, options: AnalogTraceEncodeOptions = {}): Uint8Array {
    const opts = resolveChannelPolicy(options);
    throwOnErrors(validateAnalogTrace(message, { strict: opts.strict }));
    warnDuplicates(message.channels, opts.strict, opts.logger);

    let samples = 0;
    for (const trace of message.channels) samples += trace.voltage.length;
    const writer = new ByteWriter(160 + message.channels.length * 24 + samples * 2);
    writeHeader(writer, ANALOG_TRACE_IDENTIFIER);

    const root = writeTable(writer, ANALOG_TRACE_SLOTS, [
        { slot: AnalogTraceSlot.DIGITIZER_ID, kind: 'u8', value: message.digitizerId },
        { slot: AnalogTraceSlot.METADATA, kind: 'offset' },
        { slot: AnalogTraceSlot.SAMPLE_RATE, kind: 'u64', value: message.sampleRate },
        { slot: AnalogTraceSlot.CHANNELS, kind: 'offset' },
    ]);

    patchOffset(writer, offsetField(root, AnalogTraceSlot.METADATA), writeFrameMetadata(writer, message.metadata));

    const vector = reserveOffsetVector(writer, message.channels.length);
    patchOffset(writer, offsetField(root, AnalogTraceSlot.CHANNELS), vector.position);

    message.channels.forEach((trace, i) => {
        const table = writeTable(writer, CHANNEL_TRACE_SLOTS, [
            { slot: ChannelTraceSlot.CHANNEL, kind: 'u32', value: trace.channel },
            { slot: ChannelTraceSlot.VOLTAGE, kind: 'offset' },
        ]);
        patchOffset(writer, vector.elements[i], table.position);
        patchOffset(writer, offsetField(table, ChannelTraceSlot.VOLTAGE), writeU16Vector(writer, trace.voltage));
    });

    return finishRoot(writer, root.position);
}

export function decodeAnalogTrace(bytes: Uint8Array, options: AnalogTraceDecodeOptions = {}): AnalogTraceMessage {
    const { copy } = resolveDecodeOptions(options);
    const policy = resolveChannelPolicy(options);
    const tag = peekIdentifier(bytes);
    if (tag === null) {
        throw new TruncatedBufferError(0, HEADER_SIZE, bytes.length, 'message header');
    }
    if (tag !== ANALOG_TRACE_IDENTIFIER) throw new BadIdentifierError(ANALOG_TRACE_IDENTIFIER, tag);

    const reader = new WireReader(bytes, copy);
    const root = reader.rootTable('AnalogTraceMessage');
    const metadata = readFrameMetadata(root.requiredTable(AnalogTraceSlot.METADATA, 'metadata'));

    const channels: ChannelTrace[] = root.tableVector(AnalogTraceSlot.CHANNELS, 'channels').map(table => ({
        channel: table.u32(ChannelTraceSlot.CHANNEL, 'channel'),
        voltage: table.u16Vector(ChannelTraceSlot.VOLTAGE, 'voltage'),
    }));
    warnDuplicates(channels, policy.strict, policy.logger);

    return {
        digitizerId: root.u8(AnalogTraceSlot.DIGITIZER_ID, 'digitizerId'),
        metadata,
        sampleRate: root.u64(AnalogTraceSlot.SAMPLE_RATE, 'sampleRate'),
        channels,
    };
}
