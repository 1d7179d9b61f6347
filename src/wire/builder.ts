import { IDENTIFIER_SIZE, SOFFSET_SIZE, UOFFSET_SIZE, VTABLE_HEADER_SIZE } from './format.js';

/**
 * Inline table field. `offset` fields reserve a u32 that is patched once the referenced
 * object has been written further along the buffer.
 */
export type TableField =
    | { slot: number; kind: 'u8' | 'u16' | 'u32'; value: number }
    | { slot: number; kind: 'bool'; value: boolean }
    | { slot: number; kind: 'u64'; value: bigint }
    | { slot: number; kind: 'struct'; align: number; bytes: Uint8Array }
    | { slot: number; kind: 'offset' };

export interface WrittenTable {
    position: number;
    /** Absolute position of each `offset` field, keyed by slot. */
    offsetFields: Map<number, number>;
}

function fieldSize(field: TableField): number {
    switch (field.kind) {
        case 'u8':
        case 'bool':
            return 1;
        case 'u16':
            return 2;
        case 'u32':
        case 'offset':
            return 4;
        case 'u64':
            return 8;
        case 'struct':
            return field.bytes.length;
    }
}

function fieldAlign(field: TableField): number {
    return field.kind === 'struct' ? field.align : fieldSize(field);
}

export function alignUp(value: number, align: number): number {
    const rem = value % align;
    return rem === 0 ? value : value + (align - rem);
}

/**
 * Growable little-endian byte sink. Output is laid out front to back; every reference
 * points forward from where it is stored.
 */
export class ByteWriter {
    private buffer: Uint8Array;
    private view: DataView;
    private pos: number = 0;

    constructor(initialCapacity: number = 256) {
        this.buffer = new Uint8Array(Math.max(16, initialCapacity));
        this.view = new DataView(this.buffer.buffer);
    }

    get offset(): number {
        return this.pos;
    }

    private ensure(extra: number) {
        const needed = this.pos + extra;
        if (needed <= this.buffer.length) return;
        let capacity = this.buffer.length * 2;
        while (capacity < needed) capacity *= 2;
        const next = new Uint8Array(capacity);
        next.set(this.buffer.subarray(0, this.pos));
        this.buffer = next;
        this.view = new DataView(next.buffer);
    }

    /** Advances to `at` with zero bytes. */
    padTo(at: number) {
        if (at < this.pos) throw new Error(`ByteWriter: cannot pad backwards (${this.pos} -> ${at})`);
        this.ensure(at - this.pos);
        this.pos = at;
    }

    align(n: number) {
        this.padTo(alignUp(this.pos, n));
    }

    u8(v: number) {
        this.ensure(1);
        this.view.setUint8(this.pos, v);
        this.pos += 1;
    }

    u16(v: number) {
        this.ensure(2);
        this.view.setUint16(this.pos, v, true);
        this.pos += 2;
    }

    u32(v: number) {
        this.ensure(4);
        this.view.setUint32(this.pos, v, true);
        this.pos += 4;
    }

    i32(v: number) {
        this.ensure(4);
        this.view.setInt32(this.pos, v, true);
        this.pos += 4;
    }

    u64(v: bigint) {
        this.ensure(8);
        this.view.setBigUint64(this.pos, v, true);
        this.pos += 8;
    }

    bytes(data: Uint8Array) {
        this.ensure(data.length);
        this.buffer.set(data, this.pos);
        this.pos += data.length;
    }

    setU32At(at: number, v: number) {
        this.view.setUint32(at, v, true);
    }

    /** Returns an owned copy of the written bytes. */
    finish(): Uint8Array {
        return this.buffer.slice(0, this.pos);
    }
}

/**
 * Reserves the root offset and writes the 4-byte ASCII identifier.
 */
export function writeHeader(writer: ByteWriter, identifier: string) {
    if (writer.offset !== 0) throw new Error('writeHeader: header must start the buffer');
    if (identifier.length !== IDENTIFIER_SIZE) {
        throw new Error(`writeHeader: identifier must be ${IDENTIFIER_SIZE} characters, got "${identifier}"`);
    }
    writer.u32(0);
    for (let i = 0; i < IDENTIFIER_SIZE; i++) {
        writer.u8(identifier.charCodeAt(i) & 0xff);
    }
}

export function finishRoot(writer: ByteWriter, rootTable: number): Uint8Array {
    writer.setU32At(0, rootTable);
    return writer.finish();
}

export function patchOffset(writer: ByteWriter, fieldPosition: number, target: number) {
    if (target <= fieldPosition) {
        throw new Error(`patchOffset: reference at ${fieldPosition} must point forward (target ${target})`);
    }
    writer.setU32At(fieldPosition, target - fieldPosition);
}

/**
 * Writes a vtable immediately followed by its table. Fields are placed by descending
 * alignment, ties kept in slot order.
 */
export function writeTable(writer: ByteWriter, slotCount: number, fields: TableField[]): WrittenTable {
    const ordered = [...fields].sort((a, b) => fieldAlign(b) - fieldAlign(a));

    const fieldOffsets = new Map<number, number>();
    let cursor = SOFFSET_SIZE;
    let tableAlign = SOFFSET_SIZE;
    for (const field of ordered) {
        if (field.slot < 0 || field.slot >= slotCount) {
            throw new Error(`writeTable: slot ${field.slot} outside 0..${slotCount - 1}`);
        }
        const align = fieldAlign(field);
        cursor = alignUp(cursor, align);
        fieldOffsets.set(field.slot, cursor);
        cursor += fieldSize(field);
        tableAlign = Math.max(tableAlign, align);
    }
    const tableSize = cursor;

    writer.align(2);
    const vtablePos = writer.offset;
    writer.u16(VTABLE_HEADER_SIZE + 2 * slotCount);
    writer.u16(tableSize);
    for (let slot = 0; slot < slotCount; slot++) {
        writer.u16(fieldOffsets.get(slot) ?? 0);
    }

    writer.align(tableAlign);
    const tablePos = writer.offset;
    writer.i32(tablePos - vtablePos);

    const offsetFields = new Map<number, number>();
    for (const field of ordered) {
        writer.padTo(tablePos + (fieldOffsets.get(field.slot) ?? 0));
        switch (field.kind) {
            case 'u8': writer.u8(field.value); break;
            case 'bool': writer.u8(field.value ? 1 : 0); break;
            case 'u16': writer.u16(field.value); break;
            case 'u32': writer.u32(field.value); break;
            case 'u64': writer.u64(field.value); break;
            case 'struct': writer.bytes(field.bytes); break;
            case 'offset':
                offsetFields.set(field.slot, writer.offset);
                writer.u32(0);
                break;
        }
    }
    writer.padTo(tablePos + tableSize);

    return { position: tablePos, offsetFields };
}

/** Position of a reserved offset field, failing loudly if the table did not declare it. */
export function offsetField(table: WrittenTable, slot: number): number {
    const at = table.offsetFields.get(slot);
    if (at === undefined) throw new Error(`offsetField: slot ${slot} is not a reference field`);
    return at;
}

export function writeU16Vector(writer: ByteWriter, values: ArrayLike<number>): number {
    writer.align(UOFFSET_SIZE);
    const at = writer.offset;
    writer.u32(values.length);
    for (let i = 0; i < values.length; i++) writer.u16(values[i]);
    return at;
}

export function writeU32Vector(writer: ByteWriter, values: ArrayLike<number>): number {
    writer.align(UOFFSET_SIZE);
    const at = writer.offset;
    writer.u32(values.length);
    for (let i = 0; i < values.length; i++) writer.u32(values[i]);
    return at;
}

/**
 * Writes the length of a vector of tables and reserves one reference per element.
 * Returns the vector position and the element positions to patch.
 */
export function reserveOffsetVector(writer: ByteWriter, count: number): { position: number; elements: number[] } {
    writer.align(UOFFSET_SIZE);
    const position = writer.offset;
    writer.u32(count);
    const elements: number[] = [];
    for (let i = 0; i < count; i++) {
        elements.push(writer.offset);
        writer.u32(0);
    }
    return { position, elements };
}
