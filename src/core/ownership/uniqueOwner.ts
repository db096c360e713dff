import { getDefaultRuntime, OwnershipRuntime } from "../runtime/runtime";
import type { Releasable } from "../runtime/scope";
import type { ResourceKind } from "./resourceKind";

/**
 * Dueño único de un recurso. El único campo de estado es el valor: está
 * "ocupado" mientras ese valor no sea un centinela del kind.
 *
 * No hay copia: para pasar el recurso a otro owner hay que `steal()`-earlo.
 */
export class UniqueOwner<T> implements Releasable {
    readonly ownerId: number;
    private value: T;

    constructor(
        protected readonly kind: ResourceKind<T>,
        value: T = kind.empty,
        protected readonly runtime: OwnershipRuntime = getDefaultRuntime()
    ) {
        this.ownerId = runtime.nextOwnerId();
        this.value = kind.empty;
        this.store(value);
    }

    /** Préstamo: no transfiere ownership; el caller no debe liberarlo. */
    get(): T {
        return this.value;
    }

    isEmpty(): boolean {
        return this.kind.isEmpty(this.value);
    }

    /**
     * Libera lo que tenga (si tiene) y se queda con `next`.
     * Reasignar el mismo valor no hace nada, salvo en kinds con refcount.
     */
    reset(next: T = this.kind.empty): T {
        if (next === this.value && !this.kind.countsReferences) return next;
        const old = this.value;
        this.value = this.kind.empty;
        if (!this.kind.isEmpty(old)) this.release(old, "reset");
        this.store(next);
        return next;
    }

    /** Suelta el recurso sin liberarlo; el caller pasa a ser el dueño. */
    steal(): T {
        const v = this.value;
        this.value = this.kind.empty;
        if (!this.kind.isEmpty(v)) {
            this.runtime.emit({ type: "resource.detach", ownerId: this.ownerId, kind: this.kind.name });
        }
        return v;
    }

    /** Fin de vida del owner. Idempotente: el campo se limpia antes de liberar. */
    dispose(): void {
        const v = this.value;
        this.value = this.kind.empty;
        if (!this.kind.isEmpty(v)) this.release(v, "dispose");
    }

    private store(next: T): void {
        this.value = next;
        if (!this.kind.isEmpty(next)) {
            this.runtime.emit({ type: "resource.acquire", ownerId: this.ownerId, kind: this.kind.name });
        }
    }

    private release(v: T, reason: "dispose" | "reset"): void {
        this.kind.release(v);
        this.runtime.emit({ type: "resource.release", ownerId: this.ownerId, kind: this.kind.name, reason });
    }
}
