import type { LogLevel, RuntimeEvent, RuntimeEmitContext, RuntimeHooks } from "./events";

const noopHooks: RuntimeHooks = {
    emit() {},
};

export type RuntimeOptions = {
    hooks?: RuntimeHooks;
    /** aparece en el contexto de cada evento */
    name?: string;
};

let nextOwnerId = 1;

/**
 * A qué se reportan los owners: hooks de eventos + el scope activo.
 * No es dueño de nada; sólo observa.
 */
export class OwnershipRuntime {
    readonly hooks: RuntimeHooks;
    readonly name?: string;

    // pila de scopes abiertos con withScope (el tope es el "actual")
    private readonly scopeStack: number[] = [];

    constructor(args: RuntimeOptions = {}) {
        this.hooks = args.hooks ?? noopHooks;
        this.name = args.name;
    }

    nextOwnerId(): number {
        return nextOwnerId++;
    }

    get currentScopeId(): number | undefined {
        return this.scopeStack[this.scopeStack.length - 1];
    }

    enterScope(scopeId: number): void {
        this.scopeStack.push(scopeId);
    }

    exitScope(scopeId: number): void {
        const i = this.scopeStack.lastIndexOf(scopeId);
        if (i >= 0) this.scopeStack.splice(i, 1);
    }

    log(level: LogLevel, message: string, fields?: Record<string, unknown>) {
        this.emit({ type: "log", level, message, fields });
    }

    emit(ev: RuntimeEvent) {
        const ctx: RuntimeEmitContext = {
            runtime: this.name,
            scopeId: this.currentScopeId,
        };

        // siempre pasar ctx (nunca undefined)
        this.hooks.emit(ev, ctx);
    }
}

let defaultRuntime = new OwnershipRuntime();

/** Runtime que usan los owners construidos sin uno explícito. */
export function getDefaultRuntime(): OwnershipRuntime {
    return defaultRuntime;
}

/** Devuelve el anterior, para poder restaurarlo. */
export function setDefaultRuntime(runtime: OwnershipRuntime): OwnershipRuntime {
    const prev = defaultRuntime;
    defaultRuntime = runtime;
    return prev;
}
