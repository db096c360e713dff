import type { GuardState } from "../runtime/events";
import { getDefaultRuntime, OwnershipRuntime } from "../runtime/runtime";
import type { Releasable } from "../runtime/scope";

export type { GuardState };

/** Par startup/shutdown de un subsistema de proceso. */
export interface Lifecycle<Token> {
    startup(): Token;
    shutdown(token: Token): void;
}

/** Hook opcional que vive entre el startup y el shutdown. */
export interface LifecycleHook<HookToken> {
    install(): HookToken;
    remove(token: HookToken): void;
}

type Phase<Token, HookToken> =
    | { readonly state: "uninitialized" }
    | { readonly state: "started"; readonly token: Token }
    | { readonly state: "hook-installed"; readonly token: Token; readonly hookToken: HookToken }
    | { readonly state: "shutting-down" }
    | { readonly state: "terminated" };

// guards vivos por runtime y subsistema; sólo para avisar reentradas
const liveGuards = new WeakMap<OwnershipRuntime, Map<string, number>>();

function trackLive(runtime: OwnershipRuntime, kind: string, delta: 1 | -1): number {
    let perKind = liveGuards.get(runtime);
    if (!perKind) {
        perKind = new Map();
        liveGuards.set(runtime, perKind);
    }
    const next = (perKind.get(kind) ?? 0) + delta;
    if (next > 0) perKind.set(kind, next);
    else perKind.delete(kind);
    return next;
}

/**
 * Guard de inicialización: startup al construir, shutdown exactamente una vez
 * en `dispose`. Si hay hook, se quita antes del shutdown.
 *
 *   uninitialized -> started -> [hook-installed] -> shutting-down -> terminated
 *
 * No es reentrante: dos guards vivos del mismo subsistema violan el contrato
 * (se loguea un warn, no se impide).
 */
export class LifecycleGuard<Token, HookToken = never> implements Releasable {
    readonly ownerId: number;
    private phase: Phase<Token, HookToken> = { state: "uninitialized" };

    constructor(
        readonly kind: string,
        private readonly lifecycle: Lifecycle<Token>,
        private readonly hook?: LifecycleHook<HookToken>,
        protected readonly runtime: OwnershipRuntime = getDefaultRuntime()
    ) {
        this.ownerId = runtime.nextOwnerId();

        // si el startup tira, no hay nada que apagar: el error sigue su camino
        const token = lifecycle.startup();
        this.moveTo({ state: "started", token });

        if (trackLive(runtime, kind, 1) > 1) {
            runtime.log("warn", "subsystem.reentered", { kind, ownerId: this.ownerId });
        }

        if (hook) {
            let hookToken: HookToken;
            try {
                hookToken = hook.install();
            } catch (err) {
                // el subsistema ya arrancó: apagarlo antes de propagar
                this.dispose();
                throw err;
            }
            this.moveTo({ state: "hook-installed", token, hookToken });
        }
    }

    get state(): GuardState {
        return this.phase.state;
    }

    /** Token devuelto por el startup, mientras el subsistema esté arriba. */
    get token(): Token | undefined {
        const p = this.phase;
        return p.state === "started" || p.state === "hook-installed" ? p.token : undefined;
    }

    dispose(): void {
        const p = this.phase;
        if (p.state !== "started" && p.state !== "hook-installed") return;

        this.moveTo({ state: "shutting-down" });
        try {
            if (p.state === "hook-installed" && this.hook) this.hook.remove(p.hookToken);
        } finally {
            try {
                this.lifecycle.shutdown(p.token);
            } finally {
                trackLive(this.runtime, this.kind, -1);
                this.moveTo({ state: "terminated" });
            }
        }
    }

    private moveTo(next: Phase<Token, HookToken>): void {
        const from = this.phase.state;
        this.phase = next;
        this.runtime.emit({ type: "guard.transition", ownerId: this.ownerId, kind: this.kind, from, to: next.state });
    }
}
