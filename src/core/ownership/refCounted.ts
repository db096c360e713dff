import { crashIf, OwnershipDefect } from "../types/errors";
import type { OwnershipRuntime } from "../runtime/runtime";
import { nullableKind } from "./resourceKind";
import { UniqueOwner } from "./uniqueOwner";

/**
 * Identificador de interfaz. `is` valida que lo que devolvió un query o una
 * fábrica sea de verdad un `T`.
 */
export interface InterfaceId<T extends RefCounted> {
    readonly name: string;
    is(value: RefCounted): value is T;
}

export function interfaceId<T extends RefCounted>(
    name: string,
    is: (value: RefCounted) => value is T
): InterfaceId<T> {
    return { name, is };
}

export type ClassId = string;

/** Interfaz con conteo de referencias. */
export interface RefCounted {
    /** decrementa; el objeto se libera solo al llegar a cero */
    release(): number;
    /** devuelve una referencia nueva (ya contada) o null si no la soporta */
    queryInterface(iid: InterfaceId<RefCounted>): RefCounted | null;
}

export interface ClassFactory {
    createInstance(classId: ClassId, iid: InterfaceId<RefCounted>): RefCounted | null;
}

/**
 * Una referencia recién obtenida que no es un `T` viola el contrato del
 * colaborador: se devuelve y se corta.
 */
function expectInterface<T extends RefCounted>(iid: InterfaceId<T>, value: RefCounted | null): T | null {
    if (value === null) return null;
    if (iid.is(value)) return value;
    value.release();
    throw new OwnershipDefect(`${iid.name}: collaborator returned an object that is not a ${iid.name}`);
}

/**
 * Slot de salida para APIs que devuelven la interfaz por parámetro.
 * Válido sólo durante la llamada a `fill`; después queda sellado.
 */
export interface OutParam<T> {
    set(value: T | null): void;
}

/** Dueño de exactamente un incremento del refcount. */
export class RefCountedOwner<T extends RefCounted> extends UniqueOwner<T | null> {
    constructor(
        readonly iid: InterfaceId<T>,
        value: T | null = null,
        runtime?: OwnershipRuntime
    ) {
        super(
            {
                ...nullableKind<T>(iid.name, (v) => {
                    v.release();
                }),
                countsReferences: true,
            },
            value,
            runtime
        );
    }

    /**
     * Patrón out-param: `acquire` escribe la referencia en `out`, y al volver
     * queda en este owner (aunque `acquire` haya tirado). `out` no debe
     * guardarse: escribir después de la llamada es un defecto.
     */
    fill<R>(acquire: (out: OutParam<T>) => R): R {
        crashIf(!this.isEmpty(), `${this.iid.name}: fill on an occupied owner would leak its reference`);

        let slot: T | null = null;
        let sealed = false;
        const out: OutParam<T> = {
            set: (value) => {
                crashIf(sealed, `${this.iid.name}: out-param written after its call returned`);
                slot = value;
            },
        };

        try {
            return acquire(out);
        } finally {
            sealed = true;
            this.reset(slot);
        }
    }

    /**
     * Instancia `classId` y guarda la interfaz. Ocupado = bug del caller.
     * false si la fábrica no pudo crearla; el owner queda vacío.
     */
    create(factory: ClassFactory, classId: ClassId): boolean {
        crashIf(!this.isEmpty(), `${this.iid.name}: create(${classId}) on an occupied owner`);

        const instance = expectInterface(this.iid, factory.createInstance(classId, this.iid));
        if (instance === null) return false;
        this.reset(instance);
        return true;
    }
}

/**
 * Igual que RefCountedOwner, pero se construye a partir de otra interfaz
 * pidiéndole `iid`. Que no la soporte no es un error: queda vacío.
 */
export class QueryingRefCountedOwner<T extends RefCounted> extends RefCountedOwner<T> {
    constructor(iid: InterfaceId<T>, source: RefCounted | null = null, runtime?: OwnershipRuntime) {
        super(iid, source === null ? null : expectInterface(iid, source.queryInterface(iid)), runtime);
    }

    /** Libera la referencia actual y se queda con `source` consultada por `iid`. */
    assignQuery(source: RefCounted | null): T | null {
        this.reset(null);
        return this.reset(source === null ? null : expectInterface(this.iid, source.queryInterface(this.iid)));
    }
}
