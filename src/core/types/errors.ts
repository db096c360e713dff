/**
 * Violación de precondición del lado del caller (p.ej. `create` sobre un owner
 * ocupado). No es recuperable: se lanza, nunca se devuelve como valor.
 */
export class OwnershipDefect extends Error {
    readonly _tag = "Defect";

    constructor(message: string) {
        super(message);
        this.name = "OwnershipDefect";
    }
}

/** Uno o más finalizers fallaron al cerrar un scope (todos se ejecutaron igual). */
export class FinalizerError extends Error {
    readonly _tag = "FinalizerError";
    readonly errors: readonly unknown[];

    constructor(scopeId: number, errors: readonly unknown[]) {
        super(`scope#${scopeId}: ${errors.length} finalizer(s) failed`);
        this.name = "FinalizerError";
        this.errors = errors;
    }
}

export function crashIf(condition: boolean, message: string): void {
    if (condition) throw new OwnershipDefect(message);
}

export function describeError(err: unknown): string {
    return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
