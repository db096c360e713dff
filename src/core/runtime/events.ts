export type LogLevel = "debug" | "info" | "warn" | "error";

export type GuardState = "uninitialized" | "started" | "hook-installed" | "shutting-down" | "terminated";

export type RuntimeEvent =
  | {
      type: "resource.acquire";
      ownerId: number;
      kind: string;
    }
  | {
      type: "resource.release";
      ownerId: number;
      kind: string;
      // reset = liberado por reasignación, dispose = fin de vida del owner
      reason: "dispose" | "reset";
    }
  | {
      type: "resource.detach";
      ownerId: number;
      kind: string;
    }
  | {
      type: "guard.transition";
      ownerId: number;
      kind: string;
      from: GuardState;
      to: GuardState;
    }
  | {
      type: "scope.open";
      scopeId: number;
      parentScopeId?: number;
    }
  | {
      type: "scope.close";
      scopeId: number;
      status: "success" | "failure";
      finalizers: number;
      error?: unknown;
    }
  | {
      type: "log";
      level: LogLevel;
      message: string;
      fields?: Record<string, unknown>;
    };

export type RuntimeEmitContext = {
  runtime?: string;
  scopeId?: number;
};

export interface RuntimeHooks {
  emit(ev: RuntimeEvent, ctx: RuntimeEmitContext): void;
}

export type RuntimeEventRecord = RuntimeEvent &
  RuntimeEmitContext & {
    seq: number;
    wallTs: number; // Date.now()
    ts: number; // performance.now(), monotónico
  };
