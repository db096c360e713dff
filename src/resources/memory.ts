import { nullableKind } from "../core/ownership/resourceKind";
import { UniqueOwner } from "../core/ownership/uniqueOwner";
import type { OwnershipRuntime } from "../core/runtime/runtime";

/** Allocator externo. `free(null)` debe ser no-op. */
export interface Allocator<T> {
    allocate(size: number): T | null;
    free(buffer: T | null): void;
}

/** Destrucción de un objeto construido en el heap. `destroy(null)` es no-op. */
export interface Destroyer<T> {
    destroy(object: T | null): void;
}

/** Buffer pedido a un allocator; se devuelve con `free`. */
export class RawMemoryOwner<T> extends UniqueOwner<T | null> {
    constructor(allocator: Allocator<T>, buffer: T | null = null, runtime?: OwnershipRuntime) {
        super(
            nullableKind<T>("memory", (b) => allocator.free(b)),
            buffer,
            runtime
        );
    }

    /** Pide `size` al allocator; si falla, el owner queda vacío. */
    static allocate<T>(allocator: Allocator<T>, size: number, runtime?: OwnershipRuntime): RawMemoryOwner<T> {
        return new RawMemoryOwner(allocator, allocator.allocate(size), runtime);
    }
}

/** Un único objeto del heap; se destruye con `destroy`. */
export class HeapObjectOwner<T> extends UniqueOwner<T | null> {
    constructor(destroyer: Destroyer<T>, object: T | null = null, runtime?: OwnershipRuntime) {
        super(
            nullableKind<T>("heap-object", (o) => destroyer.destroy(o)),
            object,
            runtime
        );
    }
}
