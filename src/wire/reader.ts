import {
    HEADER_SIZE, IDENTIFIER_OFFSET, IDENTIFIER_SIZE, SOFFSET_SIZE, UOFFSET_SIZE, VTABLE_HEADER_SIZE
} from './format.js';
import { MalformedTableError, MissingRequiredFieldError, TruncatedBufferError } from './errors.js';

const HOST_LITTLE_ENDIAN = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

/**
 * Reads the 4-byte ASCII tag at the fixed identifier offset, or null if the buffer is too short.
 */
export function peekIdentifier(bytes: Uint8Array): string | null {
    if (bytes.length < HEADER_SIZE) return null;
    let tag = '';
    for (let i = 0; i < IDENTIFIER_SIZE; i++) {
        tag += String.fromCharCode(bytes[IDENTIFIER_OFFSET + i]);
    }
    return tag;
}

/**
 * Bounds-checked view over an encoded buffer. Every read that would leave the buffer
 * raises TruncatedBufferError.
 */
export class WireReader {
    readonly view: DataView;

    constructor(readonly bytes: Uint8Array, readonly copy: boolean) {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get length(): number {
        return this.bytes.length;
    }

    require(offset: number, size: number, what: string) {
        if (offset < 0 || offset + size > this.bytes.length) {
            throw new TruncatedBufferError(offset, size, this.bytes.length, what);
        }
    }

    u8(at: number): number {
        return this.view.getUint8(at);
    }

    u16(at: number): number {
        return this.view.getUint16(at, true);
    }

    u32(at: number): number {
        return this.view.getUint32(at, true);
    }

    i32(at: number): number {
        return this.view.getInt32(at, true);
    }

    u64(at: number): bigint {
        return this.view.getBigUint64(at, true);
    }

    /**
     * Follows a u32 forward reference stored at `at`. A zeroed reference counts as absent.
     */
    deref(at: number, what: string): number | null {
        this.require(at, UOFFSET_SIZE, what);
        const rel = this.u32(at);
        return rel === 0 ? null : at + rel;
    }

    rootTable(what: string): TableView {
        this.require(0, HEADER_SIZE, 'message header');
        const root = this.deref(0, 'root offset');
        if (root === null) throw new MissingRequiredFieldError(what);
        return new TableView(this, root, what);
    }

    u16Array(at: number, count: number): Uint16Array {
        if (!this.copy && HOST_LITTLE_ENDIAN && (this.bytes.byteOffset + at) % 2 === 0) {
            return new Uint16Array(this.bytes.buffer, this.bytes.byteOffset + at, count);
        }
        const out = new Uint16Array(count);
        for (let i = 0; i < count; i++) out[i] = this.u16(at + i * 2);
        return out;
    }

    u32Array(at: number, count: number): Uint32Array {
        if (!this.copy && HOST_LITTLE_ENDIAN && (this.bytes.byteOffset + at) % 4 === 0) {
            return new Uint32Array(this.bytes.buffer, this.bytes.byteOffset + at, count);
        }
        const out = new Uint32Array(count);
        for (let i = 0; i < count; i++) out[i] = this.u32(at + i * 4);
        return out;
    }
}

/**
 * A decoded table: its position plus the vtable that locates its fields.
 */
export class TableView {
    private readonly vtable: number;
    private readonly vtableSize: number;

    constructor(readonly reader: WireReader, readonly position: number, readonly name: string) {
        reader.require(position, SOFFSET_SIZE, `${name} table`);
        const vtable = position - reader.i32(position);
        reader.require(vtable, VTABLE_HEADER_SIZE, `${name} vtable`);
        const vtableSize = reader.u16(vtable);
        if (vtableSize < VTABLE_HEADER_SIZE || vtableSize % 2 !== 0) {
            throw new MalformedTableError(name, `invalid vtable size ${vtableSize}`);
        }
        reader.require(vtable, vtableSize, `${name} vtable`);
        reader.require(position, reader.u16(vtable + 2), `${name} table`);
        this.vtable = vtable;
        this.vtableSize = vtableSize;
    }

    /** Offset of a slot's field from the table start, 0 when absent. */
    fieldOffset(slot: number): number {
        const entry = VTABLE_HEADER_SIZE + slot * 2;
        if (entry >= this.vtableSize) return 0;
        return this.reader.u16(this.vtable + entry);
    }

    private field(slot: number, size: number, label: string): number | null {
        const rel = this.fieldOffset(slot);
        if (rel === 0) return null;
        const at = this.position + rel;
        this.reader.require(at, size, `${this.name}.${label}`);
        return at;
    }

    u8(slot: number, label: string): number {
        const at = this.field(slot, 1, label);
        return at === null ? 0 : this.reader.u8(at);
    }

    bool(slot: number, label: string): boolean {
        return this.u8(slot, label) !== 0;
    }

    u16(slot: number, label: string): number {
        const at = this.field(slot, 2, label);
        return at === null ? 0 : this.reader.u16(at);
    }

    u32(slot: number, label: string): number {
        const at = this.field(slot, 4, label);
        return at === null ? 0 : this.reader.u32(at);
    }

    u64(slot: number, label: string): bigint {
        const at = this.field(slot, 8, label);
        return at === null ? 0n : this.reader.u64(at);
    }

    /** Absolute position of an inline struct, or null when absent. */
    struct(slot: number, size: number, label: string): number | null {
        return this.field(slot, size, label);
    }

    table(slot: number, label: string): TableView | null {
        const at = this.field(slot, UOFFSET_SIZE, label);
        if (at === null) return null;
        const target = this.reader.deref(at, `${this.name}.${label}`);
        return target === null ? null : new TableView(this.reader, target, label);
    }

    requiredTable(slot: number, label: string): TableView {
        const table = this.table(slot, label);
        if (table === null) throw new MissingRequiredFieldError(`${this.name}.${label}`);
        return table;
    }

    /** Locates a vector's elements. Absent vectors read as empty. */
    private vector(slot: number, elementSize: number, label: string): { at: number; count: number } {
        const at = this.field(slot, UOFFSET_SIZE, label);
        if (at === null) return { at: 0, count: 0 };
        const target = this.reader.deref(at, `${this.name}.${label}`);
        if (target === null) return { at: 0, count: 0 };
        this.reader.require(target, UOFFSET_SIZE, `${this.name}.${label} length`);
        const count = this.reader.u32(target);
        this.reader.require(target + UOFFSET_SIZE, count * elementSize, `${this.name}.${label}`);
        return { at: target + UOFFSET_SIZE, count };
    }

    u16Vector(slot: number, label: string): Uint16Array {
        const { at, count } = this.vector(slot, 2, label);
        return count === 0 ? new Uint16Array(0) : this.reader.u16Array(at, count);
    }

    u32Vector(slot: number, label: string): Uint32Array {
        const { at, count } = this.vector(slot, 4, label);
        return count === 0 ? new Uint32Array(0) : this.reader.u32Array(at, count);
    }

    tableVector(slot: number, label: string): TableView[] {
        const { at, count } = this.vector(slot, UOFFSET_SIZE, label);
        const tables: TableView[] = [];
        for (let i = 0; i < count; i++) {
            const element = this.reader.deref(at + i * UOFFSET_SIZE, `${this.name}.${label}[${i}]`);
            if (element === null) throw new MissingRequiredFieldError(`${this.name}.${label}[${i}]`);
            tables.push(new TableView(this.reader, element, `${label}[${i}]`));
        }
        return tables;
    }
}
