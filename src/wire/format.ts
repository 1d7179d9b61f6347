export const EVENT_LIST_IDENTIFIER = 'dev2';
export const ANALOG_TRACE_IDENTIFIER = 'dat2';

export const ROOT_OFFSET_SIZE = 4;
export const IDENTIFIER_OFFSET = 4;
export const IDENTIFIER_SIZE = 4;
export const HEADER_SIZE = ROOT_OFFSET_SIZE + IDENTIFIER_SIZE; // root uoffset(4) + tag(4)

export enum MessageKind {
    EventList = 'EventList',
    AnalogTrace = 'AnalogTrace',
    Unknown = 'Unknown',
}

// GpsTime struct:
// [year u8][pad][day u16][hour u8][minute u8][second u8][pad][ms u16][us u16][ns u16]
export const GPS_TIME_PAYLOAD_BYTES = 1 + 2 + 1 + 1 + 1 + 2 + 2 + 2;
export const GPS_TIME_SIZE = 14;
export const GPS_TIME_ALIGN = 2;

export const GpsTimeLayout = {
    YEAR: 0,
    DAY: 2,
    HOUR: 4,
    MINUTE: 5,
    SECOND: 6,
    MILLISECOND: 8,
    MICROSECOND: 10,
    NANOSECOND: 12,
} as const;

// Vtable slots, in schema declaration order.
export enum FrameMetadataSlot {
    TIMESTAMP = 0,
    PERIOD_NUMBER = 1,
    PROTONS_PER_PULSE = 2,
    RUNNING = 3,
    FRAME_NUMBER = 4,
    VETO_FLAGS = 5,
}

export enum EventListSlot {
    DIGITIZER_ID = 0,
    METADATA = 1,
    TIME = 2,
    VOLTAGE = 3,
    CHANNEL = 4,
}

export enum AnalogTraceSlot {
    DIGITIZER_ID = 0,
    METADATA = 1,
    SAMPLE_RATE = 2,
    CHANNELS = 3,
}

export enum ChannelTraceSlot {
    CHANNEL = 0,
    VOLTAGE = 1,
}

export const VTABLE_HEADER_SIZE = 4; // vtable size(u16) + table size(u16)
export const SOFFSET_SIZE = 4;
export const UOFFSET_SIZE = 4;

export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U32_MAX = 0xffffffff;
export const U64_MAX = 0xffffffffffffffffn;
