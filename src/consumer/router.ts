import { MessageKind } from '../wire/format.js';
import { type DecodedMessage, type KnownKind, decodeMessage, identify, readIdentifier } from '../wire/identify.js';
import { type WireError, isDataIntegrityError } from '../wire/errors.js';
import type { EventListMessage } from '../wire/event-list.js';
import type { AnalogTraceMessage } from '../wire/analog-trace.js';
import type { AnalogTraceDecodeOptions, WireLogger } from '../wire/types.js';
import { FailureKind, WireMetrics } from './metrics.js';

export type RouterHandlers = {
    onEventList?: (message: EventListMessage) => void;
    onAnalogTrace?: (message: AnalogTraceMessage) => void;
    /** Buffers whose identifier matches neither known kind. */
    onUnknown?: (identifier: string | null, bytes: Uint8Array) => void;
};

export type RouterOptions = {
    /** Passed to every decode call. The router's logger is used when none is set here. */
    decode?: AnalogTraceDecodeOptions;
    logger?: WireLogger | null;
    /** Counters to record into; a private instance is created when omitted. */
    metrics?: WireMetrics;
};

export type RouteOutcome =
    | { status: 'delivered'; kind: KnownKind }
    | { status: 'ignored'; kind: KnownKind }
    | { status: 'unknown'; identifier: string | null }
    | { status: 'failed'; kind: KnownKind; error: WireError };

/**
 * Consumer-side dispatch of opaque transport payloads to typed handlers.
 *
 * Foreign buffers are reported as `unknown`. Buffers that carry a known identifier but fail
 * to decode are counted as UnableToDecodeMessage and logged; they never reach a handler.
 * Exceptions thrown by handlers propagate to the caller.
 */
export class MessageRouter {
    readonly metrics: WireMetrics;
    private readonly logger: WireLogger | null;
    private readonly decodeOptions: AnalogTraceDecodeOptions;

    constructor(private readonly handlers: RouterHandlers, options: RouterOptions = {}) {
        this.metrics = options.metrics ?? new WireMetrics();
        this.logger = options.logger ?? null;
        this.decodeOptions = { ...options.decode, logger: options.decode?.logger ?? this.logger };
    }

    route(bytes: Uint8Array): RouteOutcome {
        const kind = identify(bytes);
        this.metrics.recordReceived(kind);

        if (kind === MessageKind.Unknown) {
            const identifier = readIdentifier(bytes);
            this.logger?.warn?.(`Unexpected message identifier ${JSON.stringify(identifier)} (${bytes.length} bytes)`);
            this.handlers.onUnknown?.(identifier, bytes);
            return { status: 'unknown', identifier };
        }

        let decoded: DecodedMessage;
        try {
            decoded = decodeMessage(bytes, this.decodeOptions);
        } catch (err) {
            if (!isDataIntegrityError(err)) throw err;
            this.metrics.recordFailure(FailureKind.UnableToDecodeMessage);
            this.logger?.warn?.(`Failed to parse ${kind} message: ${err.message}`);
            return { status: 'failed', kind, error: err };
        }

        const { digitizerId, metadata } = decoded.message;
        this.logger?.info?.(`${kind} message: digitizer ${digitizerId}, frame ${metadata.frameNumber}`);

        switch (decoded.kind) {
            case MessageKind.EventList:
                if (!this.handlers.onEventList) return { status: 'ignored', kind: decoded.kind };
                this.handlers.onEventList(decoded.message);
                break;
            case MessageKind.AnalogTrace:
                if (!this.handlers.onAnalogTrace) return { status: 'ignored', kind: decoded.kind };
                this.handlers.onAnalogTrace(decoded.message);
                break;
        }
        return { status: 'delivered', kind: decoded.kind };
    }
}
