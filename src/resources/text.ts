import type { OwnershipRuntime } from "../core/runtime/runtime";
import { type Allocator, RawMemoryOwner } from "./memory";

/** Allocator de texto que además sabe duplicar. */
export interface StringDuplicator<T> extends Allocator<T> {
    /** sólo definido para texto no vacío (no null) */
    duplicate(borrowed: T): T;
}

/**
 * Buffer de texto propio. `assignCopy` guarda una copia de un texto prestado,
 * independiente de la vida del original.
 */
export class DuplicatingStringOwner<T> extends RawMemoryOwner<T> {
    constructor(
        private readonly strings: StringDuplicator<T>,
        text: T | null = null,
        runtime?: OwnershipRuntime
    ) {
        super(strings, text, runtime);
    }

    /**
     * Se copia antes de liberar: `borrowed` puede ser el propio buffer.
     * El viejo igual se libera antes de guardar la copia.
     */
    assignCopy(borrowed: T | null | undefined): T | null {
        const copy = borrowed === null || borrowed === undefined ? null : this.strings.duplicate(borrowed);
        return this.reset(copy);
    }
}

export type ByteText = Uint8Array;
export type WideText = Uint16Array;

// free: se pisa con ceros, así un préstamo colgado se nota
export const byteStrings: StringDuplicator<ByteText> = {
    allocate: (size) => new Uint8Array(size),
    free: (buffer) => {
        buffer?.fill(0);
    },
    duplicate: (borrowed) => borrowed.slice(),
};

export const wideStrings: StringDuplicator<WideText> = {
    allocate: (size) => new Uint16Array(size),
    free: (buffer) => {
        buffer?.fill(0);
    },
    duplicate: (borrowed) => borrowed.slice(),
};

const encoder = new TextEncoder();
const decoder = new TextDecoder();
const wideDecoder = new TextDecoder("utf-16le");

export function byteText(s: string): ByteText {
    return encoder.encode(s);
}

export function fromByteText(text: ByteText): string {
    return decoder.decode(text);
}

export function wideText(s: string): WideText {
    const out = new Uint16Array(s.length);
    for (let i = 0; i < s.length; i++) out[i] = s.charCodeAt(i);
    return out;
}

export function fromWideText(text: WideText): string {
    return wideDecoder.decode(text);
}

/** Texto de bytes (UTF-8). */
export class AutoFree extends DuplicatingStringOwner<ByteText> {
    constructor(text: ByteText | null = null, runtime?: OwnershipRuntime) {
        super(byteStrings, text, runtime);
    }
}

/** Texto ancho (UTF-16). */
export class AutoFreeW extends DuplicatingStringOwner<WideText> {
    constructor(text: WideText | null = null, runtime?: OwnershipRuntime) {
        super(wideStrings, text, runtime);
    }
}
