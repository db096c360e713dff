import type { ResourceRegistry } from "./registry";

export function dumpLiveResources(reg: ResourceRegistry, recentLimit = 40): string {
    const live = reg.liveResources();
    live.sort((a, b) => a.acquiredAt - b.acquiredAt || a.ownerId - b.ownerId);

    const lines: string[] = [];
    lines.push(`=== Live Resources (${live.length}) ===`);
    for (const r of live) {
        lines.push(
            `owner#${r.ownerId} kind=${r.kind} scope=${r.scopeId ?? "-"}` +
            (r.state ? ` state=${r.state}` : "") +
            ` since=${new Date(r.acquiredAt).toISOString()}`
        );
    }

    lines.push(`=== Recent Events ===`);
    const recent = recentLimit > 0 ? reg.getRecentEvents().slice(-recentLimit) : [];
    for (const ev of recent) {
        const subject = "ownerId" in ev ? `owner=${ev.ownerId}` : `scope=${ev.scopeId ?? "-"}`;
        lines.push(`${ev.seq} ${ev.type} ${subject}`);
    }
    return lines.join("\n");
}
