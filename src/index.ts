/**
 * Digitizer stream wire format: public API
 *
 * @module digitizer-wire
 */

import { encodeEventList, decodeEventList, validateEventList } from './wire/event-list.js';
import { encodeAnalogTrace, decodeAnalogTrace, validateAnalogTrace } from './wire/analog-trace.js';
import { identify, decodeMessage, readIdentifier, hasIdentifier, getCodec } from './wire/identify.js';
import { encodeGpsTime, decodeGpsTime, gpsTimeFromDate, gpsTimeToDate } from './wire/gps-time.js';

export type { GpsTime } from './wire/gps-time.js';
export type { FrameMetadata } from './wire/frame-metadata.js';
export type { EventListMessage, EventListInput } from './wire/event-list.js';
export type { AnalogTraceMessage, AnalogTraceInput, ChannelTrace, ChannelTraceInput } from './wire/analog-trace.js';
export type { DecodedMessage, KnownKind, MessageCodec } from './wire/identify.js';
export type { Violation, ValidationResult } from './wire/validation.js';
export type {
    WireLogger, DecodeOptions, ChannelPolicyOptions, AnalogTraceEncodeOptions, AnalogTraceDecodeOptions, ValidateOptions
} from './wire/types.js';
export {
    DEFAULT_DECODE_OPTIONS, DEFAULT_CHANNEL_POLICY, resolveDecodeOptions, resolveChannelPolicy
} from './wire/types.js';
export { ViolationCode } from './wire/validation.js';
export {
    MessageKind, EVENT_LIST_IDENTIFIER, ANALOG_TRACE_IDENTIFIER, GPS_TIME_SIZE, GPS_TIME_PAYLOAD_BYTES
} from './wire/format.js';
export {
    WireError, BadIdentifierError, MissingRequiredFieldError, LengthMismatchError, TruncatedBufferError,
    ZeroSampleRateError, DuplicateChannelError, FieldRangeError, MalformedTableError, isForeignBuffer, isDataIntegrityError
} from './wire/errors.js';
export { validateFrameMetadata } from './wire/frame-metadata.js';
export { validateGpsTime } from './wire/gps-time.js';
export { findDuplicateChannels } from './wire/analog-trace.js';
export { EventListCodec, AnalogTraceCodec } from './wire/identify.js';
export {
    encodeEventList, decodeEventList, validateEventList,
    encodeAnalogTrace, decodeAnalogTrace, validateAnalogTrace,
    identify, decodeMessage, readIdentifier, hasIdentifier, getCodec,
    encodeGpsTime, decodeGpsTime, gpsTimeFromDate, gpsTimeToDate,
};

export { MessageRouter } from './consumer/router.js';
export type { RouterHandlers, RouterOptions, RouteOutcome } from './consumer/router.js';
export { WireMetrics, FailureKind } from './consumer/metrics.js';
export type { MetricsSnapshot } from './consumer/metrics.js';
export {
    createSyntheticTrace, syntheticTraceFrames, encodeSyntheticTrace, DEFAULT_SYNTHETIC_TRACE
} from './producer/synthetic-trace.js';
export type { SyntheticTraceOptions } from './producer/synthetic-trace.js';

// The DigitizerWire namespace object
export const DigitizerWire = {
    /**
     * Event-mode messages ("dev2"): parallel time / voltage / channel arrays.
     */
    eventList: {
        encode: encodeEventList,
        decode: decodeEventList,
        validate: validateEventList,
    },

    /**
     * Waveform messages ("dat2"): one voltage trace per channel at a shared sample rate.
     */
    analogTrace: {
        encode: encodeAnalogTrace,
        decode: decodeAnalogTrace,
        validate: validateAnalogTrace,
    },

    gpsTime: {
        encode: encodeGpsTime,
        decode: decodeGpsTime,
        fromDate: gpsTimeFromDate,
        toDate: gpsTimeToDate,
    },

    /**
     * Reads only the 4-byte identifier and classifies the buffer.
     */
    identify,

    /**
     * Decodes whichever known kind the identifier names.
     */
    decode: decodeMessage,
};

export default DigitizerWire;
