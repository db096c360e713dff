import { nullableKind } from "../core/ownership/resourceKind";
import { UniqueOwner } from "../core/ownership/uniqueOwner";
import { crashIf } from "../core/types/errors";
import type { OwnershipRuntime } from "../core/runtime/runtime";
import type { Releasable } from "../core/runtime/scope";

/** Primitiva de exclusión mutua. `acquire` bloquea hasta obtenerla. */
export interface LockPrimitive {
    acquire(): void;
    release(): void;
}

const lockKind = nullableKind<LockPrimitive>("lock", (lock) => lock.release());

/**
 * Toma el lock al construirse y lo suelta en `dispose`. A propósito no tiene
 * reset ni steal: el lock vive lo que vive el guard.
 */
export class LockGuard implements Releasable {
    private readonly held: UniqueOwner<LockPrimitive | null>;

    constructor(lock: LockPrimitive, runtime?: OwnershipRuntime) {
        lock.acquire();
        this.held = new UniqueOwner(lockKind, lock, runtime);
    }

    get ownerId(): number {
        return this.held.ownerId;
    }

    isHeld(): boolean {
        return !this.held.isEmpty();
    }

    dispose(): void {
        this.held.dispose();
    }
}

/**
 * Sección crítica reentrante. En un solo hilo nunca hay contención: sólo
 * cuenta la profundidad de anidamiento.
 */
export class CriticalSection implements LockPrimitive {
    private depth_ = 0;

    get depth(): number {
        return this.depth_;
    }

    acquire(): void {
        this.depth_++;
    }

    release(): void {
        crashIf(this.depth_ === 0, "CriticalSection released while not held");
        this.depth_--;
    }
}
