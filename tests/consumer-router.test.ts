import { describe, it, expect, vi } from 'vitest';
import {
    MessageRouter, WireMetrics, FailureKind, MessageKind, encodeEventList, encodeAnalogTrace,
    TruncatedBufferError, DuplicateChannelError
} from '../src/index.js';
import { sampleAnalogTrace, sampleEventList } from './helpers/fixtures.js';

function foreign(tag: string): Uint8Array {
    const bytes = new Uint8Array(8);
    for (let i = 0; i < 4; i++) bytes[4 + i] = tag.charCodeAt(i);
    return bytes;
}

const duplicatedTrace = () => encodeAnalogTrace(sampleAnalogTrace({
    channels: [
        { channel: 3, voltage: new Uint16Array([1]) },
        { channel: 3, voltage: new Uint16Array([2]) },
    ],
}));

describe('MessageRouter', () => {
    it('delivers each kind to its handler and counts it', () => {
        const onEventList = vi.fn();
        const onAnalogTrace = vi.fn();
        const router = new MessageRouter({ onEventList, onAnalogTrace });

        expect(router.route(encodeEventList(sampleEventList()))).toEqual({ status: 'delivered', kind: MessageKind.EventList });
        expect(router.route(encodeAnalogTrace(sampleAnalogTrace()))).toEqual({ status: 'delivered', kind: MessageKind.AnalogTrace });
        expect(router.route(encodeAnalogTrace(sampleAnalogTrace()))).toEqual({ status: 'delivered', kind: MessageKind.AnalogTrace });

        expect(onEventList).toHaveBeenCalledWith(sampleEventList());
        expect(onAnalogTrace).toHaveBeenCalledTimes(2);
        expect(router.metrics.snapshot()).toEqual({
            messagesReceived: { EventList: 1, AnalogTrace: 2, Unknown: 0 },
            failures: { UnableToDecodeMessage: 0 },
        });
    });

    it('logs each delivered frame', () => {
        const info = vi.fn();
        const router = new MessageRouter({ onEventList: () => {} }, { logger: { info } });
        router.route(encodeEventList(sampleEventList()));
        expect(info).toHaveBeenCalledWith('EventList message: digitizer 3, frame 42');
    });

    it('reports foreign buffers without decoding them', () => {
        const warn = vi.fn();
        const onUnknown = vi.fn();
        const router = new MessageRouter({ onUnknown }, { logger: { warn } });

        const bytes = foreign('pl72');
        expect(router.route(bytes)).toEqual({ status: 'unknown', identifier: 'pl72' });
        expect(onUnknown).toHaveBeenCalledWith('pl72', bytes);
        expect(warn).toHaveBeenCalledWith('Unexpected message identifier "pl72" (8 bytes)');
        expect(router.metrics.snapshot().messagesReceived.Unknown).toBe(1);
        expect(router.metrics.snapshot().failures.UnableToDecodeMessage).toBe(0);
    });

    it('counts malformed buffers as decode failures', () => {
        const warn = vi.fn();
        const onAnalogTrace = vi.fn();
        const router = new MessageRouter({ onAnalogTrace }, { logger: { warn } });

        const outcome = router.route(encodeAnalogTrace(sampleAnalogTrace()).slice(0, 20));
        expect(outcome.status).toBe('failed');
        if (outcome.status === 'failed') {
            expect(outcome.kind).toBe(MessageKind.AnalogTrace);
            expect(outcome.error).toBeInstanceOf(TruncatedBufferError);
        }
        expect(onAnalogTrace).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith(
            'Failed to parse AnalogTrace message: Buffer truncated: AnalogTraceMessage table needs 4 bytes at offset 24, buffer is 20 bytes'
        );
        expect(router.metrics.snapshot()).toEqual({
            messagesReceived: { EventList: 0, AnalogTrace: 1, Unknown: 0 },
            failures: { UnableToDecodeMessage: 1 },
        });
    });

    it('ignores kinds without a handler', () => {
        const router = new MessageRouter({});
        expect(router.route(encodeEventList(sampleEventList()))).toEqual({ status: 'ignored', kind: MessageKind.EventList });
    });

    it('lets handler exceptions propagate', () => {
        const router = new MessageRouter({ onEventList: () => { throw new Error('sink full'); } });
        expect(() => router.route(encodeEventList(sampleEventList()))).toThrow('sink full');
        expect(router.metrics.snapshot().failures.UnableToDecodeMessage).toBe(0);
    });

    it('passes its logger to the duplicate channel check', () => {
        const warn = vi.fn();
        const router = new MessageRouter({ onAnalogTrace: () => {} }, { logger: { warn } });
        expect(router.route(duplicatedTrace()).status).toBe('delivered');
        expect(warn).toHaveBeenCalledWith('AnalogTrace: channel 3 appears more than once');
    });

    it('treats duplicates as failures under strict decoding', () => {
        const router = new MessageRouter({ onAnalogTrace: () => {} }, { decode: { strict: true } });
        const outcome = router.route(duplicatedTrace());
        expect(outcome.status).toBe('failed');
        if (outcome.status === 'failed') expect(outcome.error).toBeInstanceOf(DuplicateChannelError);
    });

    it('records into shared metrics', () => {
        const metrics = new WireMetrics();
        new MessageRouter({}, { metrics }).route(encodeEventList(sampleEventList()));
        new MessageRouter({}, { metrics }).route(foreign('xxxx'));
        metrics.recordFailure(FailureKind.UnableToDecodeMessage);
        expect(metrics.snapshot()).toEqual({
            messagesReceived: { EventList: 1, AnalogTrace: 0, Unknown: 1 },
            failures: { UnableToDecodeMessage: 1 },
        });
        metrics.reset();
        expect(metrics.snapshot().messagesReceived.EventList).toBe(0);
    });
});
