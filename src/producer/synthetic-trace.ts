import { type AnalogTraceMessage, type ChannelTrace, encodeAnalogTrace } from '../wire/analog-trace.js';
import { type GpsTime, gpsTimeFromDate } from '../wire/gps-time.js';
import { U16_MAX } from '../wire/format.js';

export type SyntheticTraceOptions = {
    digitizerId?: number;
    /** Number of channels, numbered from 0. */
    channelCount?: number;
    samplesPerChannel?: number;
    /** Level every sample is filled with before the marker samples are stamped. */
    baseline?: number;
    sampleRate?: bigint;
    /** Clock used to stamp each frame. */
    now?: () => Date;
};

export const DEFAULT_SYNTHETIC_TRACE: Required<SyntheticTraceOptions> = {
    digitizerId: 0,
    channelCount: 8,
    samplesPerChannel: 20_000,
    baseline: 404,
    sampleRate: 1_000_000_000n,
    now: () => new Date(),
};

/**
 * Builds a load-test trace frame. Every channel holds `baseline`, except sample 0
 * (frame number, truncated to 16 bits) and sample 1 (digitizer id), which let a consumer
 * check what it received.
 */
export function createSyntheticTrace(frameNumber: number, options: SyntheticTraceOptions = {}): AnalogTraceMessage {
    const opts: Required<SyntheticTraceOptions> = {
        digitizerId: options.digitizerId ?? DEFAULT_SYNTHETIC_TRACE.digitizerId,
        channelCount: options.channelCount ?? DEFAULT_SYNTHETIC_TRACE.channelCount,
        samplesPerChannel: options.samplesPerChannel ?? DEFAULT_SYNTHETIC_TRACE.samplesPerChannel,
        baseline: options.baseline ?? DEFAULT_SYNTHETIC_TRACE.baseline,
        sampleRate: options.sampleRate ?? DEFAULT_SYNTHETIC_TRACE.sampleRate,
        now: options.now ?? DEFAULT_SYNTHETIC_TRACE.now,
    };
    const timestamp: GpsTime = gpsTimeFromDate(opts.now());

    const channels: ChannelTrace[] = [];
    for (let channel = 0; channel < opts.channelCount; channel++) {
        const voltage = new Uint16Array(opts.samplesPerChannel).fill(opts.baseline);
        if (voltage.length > 0) voltage[0] = frameNumber & U16_MAX;
        if (voltage.length > 1) voltage[1] = opts.digitizerId;
        channels.push({ channel, voltage });
    }

    return {
        digitizerId: opts.digitizerId,
        metadata: {
            timestamp,
            periodNumber: 0n,
            protonsPerPulse: 0,
            running: true,
            frameNumber,
            vetoFlags: 0,
        },
        sampleRate: opts.sampleRate,
        channels,
    };
}

/**
 * Consecutive frames starting at `startFrame`. Infinite unless `count` is given.
 */
export function* syntheticTraceFrames(
    startFrame: number,
    options: SyntheticTraceOptions & { count?: number } = {}
): Generator<AnalogTraceMessage> {
    const { count, ...traceOptions } = options;
    for (let i = 0; count === undefined || i < count; i++) {
        yield createSyntheticTrace(startFrame + i, traceOptions);
    }
}

export function encodeSyntheticTrace(frameNumber: number, options: SyntheticTraceOptions = {}): Uint8Array {
    return encodeAnalogTrace(createSyntheticTrace(frameNumber, options));
}
