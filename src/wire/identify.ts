import { ANALOG_TRACE_IDENTIFIER, EVENT_LIST_IDENTIFIER, MessageKind } from './format.js';
import { peekIdentifier } from './reader.js';
import { BadIdentifierError } from './errors.js';
import { type EventListMessage, decodeEventList, encodeEventList, validateEventList } from './event-list.js';
import { type AnalogTraceMessage, decodeAnalogTrace, encodeAnalogTrace, validateAnalogTrace } from './analog-trace.js';
import type { ValidationResult } from './validation.js';
import type { AnalogTraceDecodeOptions } from './types.js';

export type KnownKind = Exclude<MessageKind, MessageKind.Unknown>;

export type DecodedMessage =
    | { kind: MessageKind.EventList; message: EventListMessage }
    | { kind: MessageKind.AnalogTrace; message: AnalogTraceMessage };

/**
 * Minimal shape shared by the per-kind codecs. Each codec keeps its own option types.
 */
export interface MessageCodec {
    kind: KnownKind;
    identifier: string;
    encode: (message: never) => Uint8Array;
    decode: (bytes: Uint8Array) => EventListMessage | AnalogTraceMessage;
    validate: (message: never) => ValidationResult;
}

export const EventListCodec = {
    kind: MessageKind.EventList,
    identifier: EVENT_LIST_IDENTIFIER,
    encode: encodeEventList,
    decode: decodeEventList,
    validate: validateEventList,
} as const satisfies MessageCodec;

export const AnalogTraceCodec = {
    kind: MessageKind.AnalogTrace,
    identifier: ANALOG_TRACE_IDENTIFIER,
    encode: encodeAnalogTrace,
    decode: decodeAnalogTrace,
    validate: validateAnalogTrace,
} as const satisfies MessageCodec;

const KIND_BY_IDENTIFIER: ReadonlyMap<string, KnownKind> = new Map<string, KnownKind>([
    [EVENT_LIST_IDENTIFIER, MessageKind.EventList],
    [ANALOG_TRACE_IDENTIFIER, MessageKind.AnalogTrace],
]);

/**
 * Returns the 4-byte format identifier, or null when the buffer is too short to carry one.
 */
export function readIdentifier(bytes: Uint8Array): string | null {
    return peekIdentifier(bytes);
}

export function hasIdentifier(bytes: Uint8Array, identifier: string): boolean {
    return peekIdentifier(bytes) === identifier;
}

/**
 * Classifies a buffer by its identifier alone; nothing past byte 8 is read.
 */
export function identify(bytes: Uint8Array): MessageKind {
    const tag = peekIdentifier(bytes);
    if (tag === null) return MessageKind.Unknown;
    return KIND_BY_IDENTIFIER.get(tag) ?? MessageKind.Unknown;
}

export function getCodec(kind: MessageKind.EventList): typeof EventListCodec;
export function getCodec(kind: MessageKind.AnalogTrace): typeof AnalogTraceCodec;
export function getCodec(kind: KnownKind): typeof EventListCodec | typeof AnalogTraceCodec;
export function getCodec(kind: KnownKind): typeof EventListCodec | typeof AnalogTraceCodec {
    switch (kind) {
        case MessageKind.EventList: return EventListCodec;
        case MessageKind.AnalogTrace: return AnalogTraceCodec;
    }
}

/**
 * Decodes any known message kind. Unknown identifiers raise BadIdentifierError carrying the tag found.
 */
export function decodeMessage(bytes: Uint8Array, options: AnalogTraceDecodeOptions = {}): DecodedMessage {
    const kind = identify(bytes);
    switch (kind) {
        case MessageKind.EventList:
            return { kind, message: decodeEventList(bytes, { copy: options.copy }) };
        case MessageKind.AnalogTrace:
            return { kind, message: decodeAnalogTrace(bytes, options) };
        case MessageKind.Unknown:
            throw new BadIdentifierError(null, peekIdentifier(bytes));
    }
}
