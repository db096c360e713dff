// core
export * from "./core/types/exit";
export * from "./core/types/errors";
export * from "./core/runtime/events";
export * from "./core/runtime/runtime";
export * from "./core/runtime/scope";
export * from "./core/runtime/eventBus";
export { RingBuffer, PushStatus } from "./core/runtime/ringBuffer";
export { consoleJsonLoggerSink, shouldLog, type MinLogLevel, type LoggerSinkOptions } from "./core/runtime/loggerSink";
export * from "./core/runtime/registry";
export * from "./core/runtime/dump";
export * from "./core/runtime/config";

// ownership primitives
export * from "./core/ownership/resourceKind";
export * from "./core/ownership/uniqueOwner";
export * from "./core/ownership/refCounted";
export { LifecycleGuard, type Lifecycle, type LifecycleHook } from "./core/ownership/lifecycleGuard";

// resource kinds
export * from "./resources/memory";
export * from "./resources/text";
export * from "./resources/sync";
export * from "./resources/handle";
export * from "./resources/graphics";
export * from "./resources/subsystem";
