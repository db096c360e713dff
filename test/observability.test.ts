import { describe, it, expect, vi } from "vitest";
import {
    consoleJsonLoggerSink,
    dumpLiveResources,
    EventBus,
    HandleOwner,
    LockGuard,
    CriticalSection,
    OwnershipRuntime,
    PushStatus,
    ResourceRegistry,
    RingBuffer,
    shouldLog,
    withScope,
    type RuntimeEventRecord,
} from "../src";
import { CallLog, fakeCloser } from "./support/fakes";

describe("RingBuffer", () => {
    it("rounds capacity up to a power of two", () => {
        expect(new RingBuffer<number>(5).capacity).toBe(8);
        expect(new RingBuffer<number>(1).capacity).toBe(2);
    });

    it("evicts the oldest element when full", () => {
        const rb = new RingBuffer<number>(2);

        expect(rb.push(1)).toBe(PushStatus.Ok);
        expect(rb.push(2)).toBe(PushStatus.Ok);
        expect(rb.push(3)).toBe(PushStatus.Evicted);
        expect(rb.toArray()).toEqual([2, 3]);
        expect(rb.shift()).toBe(2);
        expect(rb.shift()).toBe(3);
        expect(rb.shift()).toBeUndefined();
        expect(rb.isEmpty()).toBe(true);
    });
});

describe("EventBus", () => {
    it("stamps events with context and sequence numbers", () => {
        const bus = new EventBus({ autoFlush: false });
        const seen: RuntimeEventRecord[] = [];
        bus.subscribe((ev) => seen.push(ev));

        bus.emit({ type: "log", level: "info", message: "a" }, { runtime: "rt" });
        bus.emit({ type: "log", level: "info", message: "b" }, { runtime: "rt" });
        expect(seen).toHaveLength(0);
        bus.flush();

        expect(seen.map((e) => e.seq)).toEqual([1, 2]);
        expect(seen[0]).toMatchObject({ type: "log", message: "a", runtime: "rt" });
    });

    it("drains on a microtask by default", async () => {
        const bus = new EventBus();
        const seen: string[] = [];
        bus.subscribe((ev) => seen.push(ev.type));

        bus.emit({ type: "scope.open", scopeId: 1 }, {});
        expect(seen).toEqual([]);
        await Promise.resolve();
        expect(seen).toEqual(["scope.open"]);
    });

    it("reports dropped events as a warning", () => {
        const bus = new EventBus({ capacity: 2, autoFlush: false });
        const seen: RuntimeEventRecord[] = [];
        bus.subscribe((ev) => seen.push(ev));

        for (let i = 0; i < 5; i++) bus.emit({ type: "log", level: "debug", message: `m${i}` }, {});
        bus.flush();

        expect(seen[0]).toMatchObject({ type: "log", level: "warn", message: "eventbus.dropped", fields: { dropped: 3 } });
        expect(seen.slice(1).map((e) => (e.type === "log" ? e.message : e.type))).toEqual(["m3", "m4"]);
    });

    it("hands handler failures to onHandlerError and keeps delivering", () => {
        const onHandlerError = vi.fn();
        const bus = new EventBus({ autoFlush: false, onHandlerError });
        const seen: number[] = [];
        bus.subscribe(() => {
            throw new Error("sink down");
        });
        bus.subscribe((ev) => seen.push(ev.seq));

        bus.emit({ type: "scope.open", scopeId: 1 }, {});
        bus.flush();

        expect(onHandlerError).toHaveBeenCalledTimes(1);
        expect(seen).toEqual([1]);
    });

    it("unsubscribe stops delivery", () => {
        const bus = new EventBus({ autoFlush: false });
        const seen: number[] = [];
        const off = bus.subscribe((ev) => seen.push(ev.seq));

        off();
        bus.emit({ type: "scope.open", scopeId: 1 }, {});
        bus.flush();
        expect(seen).toEqual([]);
    });
});

describe("consoleJsonLoggerSink", () => {
    const record = (level: "debug" | "info" | "warn" | "error", message: string): RuntimeEventRecord => ({
        type: "log",
        level,
        message,
        fields: { ownerId: 3 },
        seq: 1,
        ts: 0,
        wallTs: 1000,
        runtime: "rt",
        scopeId: 2,
    });

    it("writes log events at or above the minimum level as JSON", () => {
        const lines: Array<[string, string]> = [];
        const sink = consoleJsonLoggerSink({ minLevel: "warn", write: (line, level) => lines.push([level, line]) });

        sink(record("info", "quiet"));
        sink(record("error", "loud"));

        expect(lines).toEqual([
            ["error", '{"level":"error","msg":"loud","wallTs":1000,"runtime":"rt","scopeId":2,"ownerId":3}'],
        ]);
    });

    it("ignores non-log events", () => {
        const write = vi.fn();
        const sink = consoleJsonLoggerSink({ minLevel: "debug", write });

        sink({ type: "scope.open", scopeId: 1, seq: 1, ts: 0, wallTs: 0 });
        expect(write).not.toHaveBeenCalled();
    });

    it("orders levels", () => {
        expect(shouldLog("debug", "info")).toBe(false);
        expect(shouldLog("warn", "info")).toBe(true);
        expect(shouldLog("error", "silent")).toBe(false);
    });
});

describe("ResourceRegistry", () => {
    function observed() {
        const bus = new EventBus({ autoFlush: false });
        const registry = new ResourceRegistry();
        bus.subscribe(registry.onEvent);
        return { bus, registry, runtime: new OwnershipRuntime({ hooks: bus }) };
    }

    it("tracks a resource as live between acquire and release", () => {
        const log = new CallLog();
        const { bus, registry, runtime } = observed();
        const h = new HandleOwner(fakeCloser(log), 5, runtime);

        bus.flush();
        expect(registry.isLive(h.ownerId)).toBe(true);
        expect(registry.liveResources()).toMatchObject([{ ownerId: h.ownerId, kind: "handle" }]);

        h.dispose();
        bus.flush();
        expect(registry.isLive(h.ownerId)).toBe(false);
        expect(registry.releasedCount()).toBe(1);
    });

    it("forgets detached resources without counting a release", () => {
        const log = new CallLog();
        const { bus, registry, runtime } = observed();
        const h = new HandleOwner(fakeCloser(log), 5, runtime);

        h.steal();
        bus.flush();
        expect(registry.liveResources()).toEqual([]);
        expect(registry.releasedCount()).toBe(0);
    });

    it("records scopes and their status", () => {
        const { bus, registry, runtime } = observed();

        const id = withScope((scope) => scope.id, runtime);
        bus.flush();

        expect(registry.scopes.get(id)).toMatchObject({ scopeId: id, status: "success" });
    });

    it("keeps a bounded window of closed scopes", () => {
        const bus = new EventBus({ autoFlush: false });
        const registry = new ResourceRegistry(16, 2);
        bus.subscribe(registry.onEvent);
        const runtime = new OwnershipRuntime({ hooks: bus });

        const [outer, closed] = withScope((scope) => {
            const ids = [1, 2, 3].map(() => withScope((inner) => inner.id, runtime));
            bus.flush();
            return [scope.id, ids] as const;
        }, runtime);

        expect(Array.from(registry.scopes.keys())).toEqual([outer, closed[1], closed[2]]);
        expect(registry.scopes.get(outer)?.closedAt).toBeUndefined();
    });

    it("dumps live resources", () => {
        const log = new CallLog();
        const { bus, registry, runtime } = observed();
        const lock = new LockGuard(new CriticalSection(), runtime);
        const h = new HandleOwner(fakeCloser(log), 5, runtime);
        bus.flush();

        const lines = dumpLiveResources(registry).split("\n");

        expect(lines[0]).toBe("=== Live Resources (2) ===");
        expect(lines[1]).toMatch(new RegExp(`^owner#${lock.ownerId} kind=lock scope=- since=`));
        expect(lines[2]).toMatch(new RegExp(`^owner#${h.ownerId} kind=handle scope=- since=`));
        expect(lines[3]).toBe("=== Recent Events ===");
        expect(lines.slice(4)).toEqual([
            `1 resource.acquire owner=${lock.ownerId}`,
            `2 resource.acquire owner=${h.ownerId}`,
        ]);
    });
});
