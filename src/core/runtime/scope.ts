// src/core/runtime/scope.ts
import { Exit, exitStatus } from "../types/exit";
import { describeError, FinalizerError } from "../types/errors";
import { getDefaultRuntime, OwnershipRuntime } from "./runtime";

export type ScopeId = number;

export type Finalizer = (exit: Exit<unknown>) => void;

/** Lo mínimo que un scope necesita para liberar algo: un dispose idempotente. */
export interface Releasable {
    dispose(): void;
}

let nextScopeId = 1;

export class Scope {
    readonly id: ScopeId;

    private closed = false;

    private readonly subScopes = new Set<Scope>();
    private readonly finalizers: Finalizer[] = [];

    constructor(
        readonly runtime: OwnershipRuntime = getDefaultRuntime(),
        private readonly parent?: Scope
    ) {
        this.id = nextScopeId++;
        this.runtime.emit({ type: "scope.open", scopeId: this.id, parentScopeId: parent?.id });
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** registra un finalizer (LIFO) */
    addFinalizer(f: Finalizer): void {
        if (this.closed) {
            throw new Error(`Trying to add finalizer to closed scope#${this.id}`);
        }
        this.finalizers.push(f);
    }

    /** El owner se libera cuando cierra el scope, en orden inverso al registro. */
    own<O extends Releasable>(owner: O): O {
        this.addFinalizer(() => owner.dispose());
        return owner;
    }

    /** crea un sub scope (mismo runtime); se cierra antes que los finalizers propios */
    subScope(): Scope {
        if (this.closed) throw new Error(`scope#${this.id} closed`);
        const s = new Scope(this.runtime, this);
        this.subScopes.add(s);
        return s;
    }

    close(exit: Exit<unknown> = Exit.unit()): void {
        if (this.closed) return;
        this.closed = true;

        const errors: unknown[] = [];

        // 1) subscopes, el más nuevo primero
        const subScopes = Array.from(this.subScopes).reverse();
        this.subScopes.clear();
        for (const s of subScopes) {
            try {
                s.close(exit);
            } catch (err) {
                errors.push(err);
            }
        }

        // 2) finalizers en LIFO; uno que falla no frena al resto
        let ran = 0;
        for (let fin = this.finalizers.pop(); fin; fin = this.finalizers.pop()) {
            ran++;
            try {
                fin(exit);
            } catch (err) {
                errors.push(err);
            }
        }

        this.parent?.subScopes.delete(this);

        const failed = errors.length > 0 ? new FinalizerError(this.id, errors) : undefined;
        this.runtime.emit({
            type: "scope.close",
            scopeId: this.id,
            status: failed ? "failure" : exitStatus(exit),
            finalizers: ran,
            error: failed ? describeError(failed) : undefined,
        });

        if (failed) throw failed;
    }
}

/**
 * Ejecuta `body` dentro de un scope y lo cierra a la salida, sea por return o
 * por throw. Todo lo registrado con `scope.own` se libera en orden inverso.
 *
 * Es sincrónico: si `body` devuelve una Promise, el scope se cierra antes de que
 * se resuelva.
 */
export function withScope<A>(body: (scope: Scope) => A, runtime: OwnershipRuntime = getDefaultRuntime()): A {
    const scope = new Scope(runtime);
    runtime.enterScope(scope.id);
    try {
        let result: A;
        try {
            result = body(scope);
        } catch (err) {
            try {
                scope.close(Exit.fromThrown(err));
            } catch (closeErr) {
                // el error del body tiene prioridad; el del cierre queda en el log
                runtime.log("error", "scope.finalizers_failed", {
                    scopeId: scope.id,
                    error: describeError(closeErr),
                });
            }
            throw err;
        }
        scope.close(Exit.succeed(result));
        return result;
    } finally {
        runtime.exitScope(scope.id);
    }
}
