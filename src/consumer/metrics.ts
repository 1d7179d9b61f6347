import { MessageKind } from '../wire/format.js';

export enum FailureKind {
    UnableToDecodeMessage = 'UnableToDecodeMessage',
}

export interface MetricsSnapshot {
    messagesReceived: Record<MessageKind, number>;
    failures: Record<FailureKind, number>;
}

/**
 * Per-router counters of messages received (by kind) and failures (by reason).
 */
export class WireMetrics {
    private received = new Map<MessageKind, number>();
    private failed = new Map<FailureKind, number>();

    recordReceived(kind: MessageKind) {
        this.received.set(kind, (this.received.get(kind) ?? 0) + 1);
    }

    recordFailure(kind: FailureKind) {
        this.failed.set(kind, (this.failed.get(kind) ?? 0) + 1);
    }

    snapshot(): MetricsSnapshot {
        return {
            messagesReceived: {
                [MessageKind.EventList]: this.received.get(MessageKind.EventList) ?? 0,
                [MessageKind.AnalogTrace]: this.received.get(MessageKind.AnalogTrace) ?? 0,
                [MessageKind.Unknown]: this.received.get(MessageKind.Unknown) ?? 0,
            },
            failures: {
                [FailureKind.UnableToDecodeMessage]: this.failed.get(FailureKind.UnableToDecodeMessage) ?? 0,
            },
        };
    }

    reset() {
        this.received.clear();
        this.failed.clear();
    }
}
