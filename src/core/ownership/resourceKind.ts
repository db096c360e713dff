/**
 * Describe un tipo de recurso: cómo se libera y cuál es su valor "vacío".
 * `T` incluye el centinela (p.ej. `Buffer | null`, o un handle numérico).
 */
export interface ResourceKind<T> {
    readonly name: string;
    /** valor de un owner vacío */
    readonly empty: T;
    /** true para cualquier centinela (puede haber más de uno) */
    isEmpty(value: T): boolean;
    /** sólo se llama con valores no vacíos */
    release(value: T): void;
    /**
     * Cada valor entregado trae su propio incremento de refcount: un `reset`
     * con el valor que ya se tiene libera el viejo igual.
     */
    readonly countsReferences?: boolean;
}

/** Kind para punteros: `null` es el único centinela. */
export function nullableKind<T>(name: string, release: (value: T) => void): ResourceKind<T | null> {
    return {
        name,
        empty: null,
        isEmpty: (value) => value === null,
        release: (value) => {
            if (value !== null) release(value);
        },
    };
}
