import { RingBuffer } from "./ringBuffer";
import type { GuardState, RuntimeEventRecord } from "./events";

export type ResourceInfo = {
    ownerId: number;
    kind: string;
    scopeId?: number;
    acquiredAt: number;
    /** sólo para guards de ciclo de vida */
    state?: GuardState;
};

export type ScopeInfo = {
    scopeId: number;
    parentScopeId?: number;
    openAt: number;
    closedAt?: number;
    status?: "success" | "failure";
};

/**
 * Lleva la cuenta de los recursos vivos a partir del stream de eventos.
 * Se engancha como subscriber del EventBus: `bus.subscribe(registry.onEvent)`.
 */
export class ResourceRegistry {
    readonly live = new Map<number, ResourceInfo>();
    readonly scopes = new Map<number, ScopeInfo>();

    private readonly recent: RingBuffer<RuntimeEventRecord>;
    // ids de scopes cerrados, el más viejo primero; los abiertos no se podan
    private readonly closedScopes: RingBuffer<number>;
    private released = 0;

    constructor(recentCapacity = 2048, closedScopeCapacity = 256) {
        this.recent = new RingBuffer<RuntimeEventRecord>(recentCapacity);
        this.closedScopes = new RingBuffer<number>(closedScopeCapacity);
    }

    onEvent = (ev: RuntimeEventRecord) => {
        // ventana de eventos recientes (para dumps explicables)
        this.recent.push(ev);

        switch (ev.type) {
            case "resource.acquire": {
                this.live.set(ev.ownerId, {
                    ownerId: ev.ownerId,
                    kind: ev.kind,
                    scopeId: ev.scopeId,
                    acquiredAt: ev.wallTs,
                });
                break;
            }
            case "resource.release": {
                if (this.live.delete(ev.ownerId)) this.released++;
                break;
            }
            case "resource.detach": {
                // el recurso sigue vivo, pero ya no lo cuida este owner
                this.live.delete(ev.ownerId);
                break;
            }
            case "guard.transition": {
                if (ev.to === "terminated") {
                    if (this.live.delete(ev.ownerId)) this.released++;
                    break;
                }
                const current = this.live.get(ev.ownerId);
                if (current) current.state = ev.to;
                else
                    this.live.set(ev.ownerId, {
                        ownerId: ev.ownerId,
                        kind: ev.kind,
                        scopeId: ev.scopeId,
                        acquiredAt: ev.wallTs,
                        state: ev.to,
                    });
                break;
            }
            case "scope.open": {
                this.scopes.set(ev.scopeId, {
                    scopeId: ev.scopeId,
                    parentScopeId: ev.parentScopeId,
                    openAt: ev.wallTs,
                });
                break;
            }
            case "scope.close": {
                const s = this.scopes.get(ev.scopeId);
                if (!s) break;
                s.closedAt = ev.wallTs;
                s.status = ev.status;
                if (this.closedScopes.length === this.closedScopes.capacity) {
                    const oldest = this.closedScopes.shift();
                    if (oldest !== undefined) this.scopes.delete(oldest);
                }
                this.closedScopes.push(ev.scopeId);
                break;
            }
        }
    };

    liveResources(): ResourceInfo[] {
        return Array.from(this.live.values());
    }

    isLive(ownerId: number): boolean {
        return this.live.has(ownerId);
    }

    releasedCount(): number {
        return this.released;
    }

    getRecentEvents(): RuntimeEventRecord[] {
        return this.recent.toArray();
    }
}
