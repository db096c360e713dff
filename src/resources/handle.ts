import type { ResourceKind } from "../core/ownership/resourceKind";
import { UniqueOwner } from "../core/ownership/uniqueOwner";
import type { OwnershipRuntime } from "../core/runtime/runtime";

/** Handle opaco del sistema. */
export type Handle = number;

export const NULL_HANDLE: Handle = 0;
export const INVALID_HANDLE_VALUE: Handle = -1;

export interface HandleCloser {
    /** no definido para INVALID_HANDLE_VALUE */
    close(handle: Handle): void;
}

export function isValidHandle(handle: Handle): boolean {
    return handle !== NULL_HANDLE && handle !== INVALID_HANDLE_VALUE;
}

function handleKind(closer: HandleCloser): ResourceKind<Handle> {
    return {
        name: "handle",
        empty: NULL_HANDLE,
        // dos centinelas: ninguno se cierra nunca
        isEmpty: (h) => !isValidHandle(h),
        release: (h) => closer.close(h),
    };
}

export class HandleOwner extends UniqueOwner<Handle> {
    constructor(closer: HandleCloser, handle: Handle = NULL_HANDLE, runtime?: OwnershipRuntime) {
        super(handleKind(closer), handle, runtime);
    }

    isValid(): boolean {
        return isValidHandle(this.get());
    }
}
