import {
    FrameMetadataSlot, GPS_TIME_ALIGN, GPS_TIME_SIZE, U16_MAX, U32_MAX, U64_MAX, U8_MAX
} from './format.js';
import { ByteWriter, writeTable } from './builder.js';
import type { TableView } from './reader.js';
import { MissingRequiredFieldError } from './errors.js';
import { type GpsTime, encodeGpsTime, readGpsTime, validateGpsTime } from './gps-time.js';
import { ViolationCode, type Violation, checkBigInt, checkInteger } from './validation.js';

/**
 * Describes one acquisition frame. Shared by value between both message kinds.
 */
export interface FrameMetadata {
    readonly timestamp: GpsTime;
    readonly periodNumber: bigint;
    readonly protonsPerPulse: number;
    /** Frame belongs to an active (recording) run. */
    readonly running: boolean;
    /** Monotonic within one digitizer's stream only. */
    readonly frameNumber: number;
    /** One bit per veto reason; 0 means not vetoed. */
    readonly vetoFlags: number;
}

const FRAME_METADATA_SLOTS = 6;

export function validateFrameMetadata(metadata: FrameMetadata, path: string = 'metadata'): Violation[] {
    if (metadata == null) {
        return [{ code: ViolationCode.MISSING_FIELD, path, message: `${path} is required`, severity: 'error' }];
    }
    const violations = validateGpsTime(metadata.timestamp, `${path}.timestamp`);
    checkBigInt(violations, `${path}.periodNumber`, metadata.periodNumber, U64_MAX);
    checkInteger(violations, `${path}.protonsPerPulse`, metadata.protonsPerPulse, 0, U8_MAX);
    if (typeof metadata.running !== 'boolean') {
        violations.push({
            code: ViolationCode.OUT_OF_RANGE,
            path: `${path}.running`,
            message: `${path}.running must be a boolean`,
            severity: 'error',
        });
    }
    checkInteger(violations, `${path}.frameNumber`, metadata.frameNumber, 0, U32_MAX);
    checkInteger(violations, `${path}.vetoFlags`, metadata.vetoFlags, 0, U16_MAX);
    return violations;
}

/**
 * Writes the FrameMetadata table and returns its position.
 */
export function writeFrameMetadata(writer: ByteWriter, metadata: FrameMetadata): number {
    const table = writeTable(writer, FRAME_METADATA_SLOTS, [
        { slot: FrameMetadataSlot.TIMESTAMP, kind: 'struct', align: GPS_TIME_ALIGN, bytes: encodeGpsTime(metadata.timestamp) },
        { slot: FrameMetadataSlot.PERIOD_NUMBER, kind: 'u64', value: metadata.periodNumber },
        { slot: FrameMetadataSlot.PROTONS_PER_PULSE, kind: 'u8', value: metadata.protonsPerPulse },
        { slot: FrameMetadataSlot.RUNNING, kind: 'bool', value: metadata.running },
        { slot: FrameMetadataSlot.FRAME_NUMBER, kind: 'u32', value: metadata.frameNumber },
        { slot: FrameMetadataSlot.VETO_FLAGS, kind: 'u16', value: metadata.vetoFlags },
    ]);
    return table.position;
}

export function readFrameMetadata(table: TableView): FrameMetadata {
    const timestampAt = table.struct(FrameMetadataSlot.TIMESTAMP, GPS_TIME_SIZE, 'timestamp');
    if (timestampAt === null) throw new MissingRequiredFieldError(`${table.name}.timestamp`);
    return {
        timestamp: readGpsTime(table.reader.view, timestampAt),
        periodNumber: table.u64(FrameMetadataSlot.PERIOD_NUMBER, 'periodNumber'),
        protonsPerPulse: table.u8(FrameMetadataSlot.PROTONS_PER_PULSE, 'protonsPerPulse'),
        running: table.bool(FrameMetadataSlot.RUNNING, 'running'),
        frameNumber: table.u32(FrameMetadataSlot.FRAME_NUMBER, 'frameNumber'),
        vetoFlags: table.u16(FrameMetadataSlot.VETO_FLAGS, 'vetoFlags'),
    };
}
