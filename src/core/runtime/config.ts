import { EventBus } from "./eventBus";
import { consoleJsonLoggerSink, type MinLogLevel } from "./loggerSink";
import { ResourceRegistry } from "./registry";
import { OwnershipRuntime } from "./runtime";

export type RuntimeConfig = {
    logLevel: MinLogLevel;
    trackResources: boolean;
    eventCapacity: number;
    name?: string;
};

export const defaultRuntimeConfig: RuntimeConfig = {
    logLevel: "silent",
    trackResources: false,
    eventCapacity: 2048,
};

const logLevels: readonly MinLogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isLogLevel(value: string): value is MinLogLevel {
    return (logLevels as readonly string[]).includes(value);
}

/**
 * Variables de entorno:
 *
 * OWNERS_LOG_LEVEL        (optional) debug|info|warn|error|silent; default silent
 * OWNERS_TRACK_RESOURCES  (optional) true|false; lleva registro de recursos vivos; default false
 * OWNERS_EVENT_CAPACITY   (optional) cola de eventos por subscriber; default 2048
 */
export function loadRuntimeConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
    const logLevelRaw = env.OWNERS_LOG_LEVEL ?? defaultRuntimeConfig.logLevel;
    if (!isLogLevel(logLevelRaw)) {
        throw new Error(`OWNERS_LOG_LEVEL must be one of ${logLevels.join("|")} (got ${logLevelRaw})`);
    }

    const trackRaw = env.OWNERS_TRACK_RESOURCES;
    if (trackRaw !== undefined && trackRaw !== "true" && trackRaw !== "false") {
        throw new Error(`OWNERS_TRACK_RESOURCES must be true or false (got ${trackRaw})`);
    }

    const capacityRaw = env.OWNERS_EVENT_CAPACITY;
    const eventCapacity = capacityRaw === undefined ? defaultRuntimeConfig.eventCapacity : Number(capacityRaw);
    if (!Number.isInteger(eventCapacity) || eventCapacity <= 0) {
        throw new Error(`OWNERS_EVENT_CAPACITY must be a positive integer (got ${capacityRaw})`);
    }

    return {
        logLevel: logLevelRaw,
        trackResources: trackRaw === "true",
        eventCapacity,
    };
}

export type ObservedRuntime = {
    runtime: OwnershipRuntime;
    bus: EventBus;
    registry?: ResourceRegistry;
};

/** Runtime con EventBus + sinks según la config (logger JSON, registry). */
export function makeObservedRuntime(
    config: Partial<RuntimeConfig> = {},
    write?: (line: string) => void
): ObservedRuntime {
    const cfg: RuntimeConfig = { ...defaultRuntimeConfig, ...config };
    const bus = new EventBus({ capacity: cfg.eventCapacity });

    if (cfg.logLevel !== "silent") {
        bus.subscribe(consoleJsonLoggerSink({ minLevel: cfg.logLevel, write }));
    }

    let registry: ResourceRegistry | undefined;
    if (cfg.trackResources) {
        registry = new ResourceRegistry(cfg.eventCapacity);
        bus.subscribe(registry.onEvent);
    }

    return {
        runtime: new OwnershipRuntime({ hooks: bus, name: cfg.name }),
        bus,
        registry,
    };
}
