import { type Lifecycle, LifecycleGuard } from "../core/ownership/lifecycleGuard";
import type { OwnershipRuntime } from "../core/runtime/runtime";

export type SubsystemInitGuard<Token, HookToken = never> = LifecycleGuard<Token, HookToken>;

/** Código de estado del startup (HRESULT-like). Se guarda, no se interpreta. */
export type StatusCode = number;

/** Capa de composición de componentes. */
export class ComponentModelGuard extends LifecycleGuard<StatusCode> {
    constructor(lifecycle: Lifecycle<StatusCode>, runtime?: OwnershipRuntime) {
        super("component-model", lifecycle, undefined, runtime);
    }
}

/** Capa de vinculación de objetos. */
export class ObjectLinkingGuard extends LifecycleGuard<StatusCode> {
    constructor(lifecycle: Lifecycle<StatusCode>, runtime?: OwnershipRuntime) {
        super("object-linking", lifecycle, undefined, runtime);
    }
}

export type GraphicsRuntimeOptions = {
    /**
     * Sin thread de fondo. Sólo hace falta al arrancar muy temprano en el
     * proceso: ese thread compite con la mensajería entre procesos y provoca
     * timeouts. Implica instalar el hook de notificación.
     */
    suppressBackgroundThread?: boolean;
};

export interface GraphicsRuntimeApi<Token, HookToken> {
    startup(options: { suppressBackgroundThread: boolean }): Token;
    shutdown(token: Token): void;
    installNotificationHook(): HookToken;
    removeNotificationHook(hookToken: HookToken): void;
}

/** Runtime gráfico 2-D. */
export class GraphicsRuntimeGuard<Token, HookToken> extends LifecycleGuard<Token, HookToken> {
    readonly suppressBackgroundThread: boolean;

    constructor(
        api: GraphicsRuntimeApi<Token, HookToken>,
        options: GraphicsRuntimeOptions = {},
        runtime?: OwnershipRuntime
    ) {
        const suppressBackgroundThread = options.suppressBackgroundThread ?? false;
        super(
            "graphics-runtime",
            {
                startup: () => api.startup({ suppressBackgroundThread }),
                shutdown: (token) => api.shutdown(token),
            },
            suppressBackgroundThread
                ? {
                      install: () => api.installNotificationHook(),
                      remove: (hookToken) => api.removeNotificationHook(hookToken),
                  }
                : undefined,
            runtime
        );
        this.suppressBackgroundThread = suppressBackgroundThread;
    }
}
