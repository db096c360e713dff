import { describe, it, expect } from "vitest";
import { HandleOwner, INVALID_HANDLE_VALUE, isValidHandle, NULL_HANDLE } from "../src";
import { CallLog, fakeCloser } from "./support/fakes";

describe("HandleOwner", () => {
    it("closes a real handle exactly once", () => {
        const log = new CallLog();
        const h = new HandleOwner(fakeCloser(log), 12);

        expect(h.isValid()).toBe(true);
        h.dispose();
        h.dispose();
        expect(log.calls).toEqual(["close(12)"]);
    });

    it("never closes the invalid sentinel", () => {
        const log = new CallLog();
        const h = new HandleOwner(fakeCloser(log), INVALID_HANDLE_VALUE);

        expect(h.isValid()).toBe(false);
        expect(h.get()).toBe(INVALID_HANDLE_VALUE);
        h.dispose();
        expect(log.calls).toEqual([]);
    });

    it("defaults to the null handle and never closes it", () => {
        const log = new CallLog();
        const h = new HandleOwner(fakeCloser(log));

        expect(h.get()).toBe(NULL_HANDLE);
        expect(h.isValid()).toBe(false);
        h.dispose();
        expect(log.calls).toEqual([]);
    });

    it("reset closes the previous handle, skipping sentinels", () => {
        const log = new CallLog();
        const h = new HandleOwner(fakeCloser(log), INVALID_HANDLE_VALUE);

        h.reset(5);
        h.reset(6);
        h.dispose();
        expect(log.calls).toEqual(["close(5)", "close(6)"]);
    });

    it("steal returns the handle and leaves the null handle behind", () => {
        const log = new CallLog();
        const h = new HandleOwner(fakeCloser(log), 9);

        expect(h.steal()).toBe(9);
        expect(h.get()).toBe(NULL_HANDLE);
        h.dispose();
        expect(log.calls).toEqual([]);
    });

    it("classifies handles", () => {
        expect(isValidHandle(3)).toBe(true);
        expect(isValidHandle(NULL_HANDLE)).toBe(false);
        expect(isValidHandle(INVALID_HANDLE_VALUE)).toBe(false);
    });
});
