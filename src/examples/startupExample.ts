// examples/startupExample.ts
//
// Arranque de proceso: runtime gráfico sin thread de fondo, un lock y un
// handle, todos atados a un scope. Al salir se ve el orden de liberación.

import { makeObservedRuntime } from "../core/runtime/config";
import { dumpLiveResources } from "../core/runtime/dump";
import { withScope } from "../core/runtime/scope";
import { HandleOwner, type Handle } from "../resources/handle";
import { GraphicsRuntimeGuard } from "../resources/subsystem";
import { CriticalSection, LockGuard } from "../resources/sync";

export function runStartupExample(write: (line: string) => void): string[] {
    const calls: string[] = [];
    const { runtime, bus, registry } = makeObservedRuntime({ logLevel: "info", trackResources: true }, write);

    const graphics = {
        startup: (opts: { suppressBackgroundThread: boolean }) => {
            calls.push(`startup(suppress=${opts.suppressBackgroundThread})`);
            return 7;
        },
        shutdown: (token: number) => calls.push(`shutdown(${token})`),
        installNotificationHook: () => {
            calls.push("installHook");
            return 11;
        },
        removeNotificationHook: (hook: number) => calls.push(`removeHook(${hook})`),
    };
    const closer = { close: (h: Handle) => calls.push(`close(${h})`) };
    const cs = new CriticalSection();

    withScope((scope) => {
        scope.own(new GraphicsRuntimeGuard(graphics, { suppressBackgroundThread: true }, runtime));
        scope.own(new LockGuard(cs, runtime));
        scope.own(new HandleOwner(closer, 42, runtime));

        bus.flush();
        if (registry) write(dumpLiveResources(registry, 0));
        runtime.log("info", "startup.done", { lockDepth: cs.depth });
    }, runtime);

    bus.flush();
    return calls;
}
