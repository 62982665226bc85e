import { describe, it, expect } from "vitest";
import {
    flipSprite,
    flipVertical,
    isSet,
    maskFromAlpha,
    maskFromRows,
    overlap,
    solidMask,
} from "../src/mask";
import { sprite } from "./fixtures";

describe("maskFromAlpha", () => {
    it("marks pixels opaque only above the alpha threshold", () => {
        // 3x1 RGBA: alpha 0, 127, 128
        const rgba = [0, 0, 0, 0, 9, 9, 9, 127, 9, 9, 9, 128];
        const m = maskFromAlpha(3, 1, rgba);
        expect(Array.from(m.bits)).toEqual([0, 0, 1]);
    });
});

describe("maskFromRows", () => {
    it("reads # as opaque", () => {
        const m = maskFromRows(["#.", ".#"]);
        expect(m.width).toBe(2);
        expect(m.height).toBe(2);
        expect(isSet(m, 0, 0)).toBe(true);
        expect(isSet(m, 1, 0)).toBe(false);
        expect(isSet(m, 1, 1)).toBe(true);
    });
    it("treats out-of-range coordinates as transparent", () => {
        const m = solidMask(2, 2);
        expect(isSet(m, -1, 0)).toBe(false);
        expect(isSet(m, 0, 2)).toBe(false);
    });
});

describe("flipVertical", () => {
    it("mirrors rows top to bottom", () => {
        const m = flipVertical(maskFromRows(["##", "#.", ".."]));
        expect(Array.from(m.bits)).toEqual([0, 0, 1, 0, 1, 1]);
    });
    it("flipSprite keeps size and href", () => {
        const s = sprite("pipe", maskFromRows(["#", "."]));
        const f = flipSprite(s);
        expect(f.href).toBe("pipe");
        expect(f.height).toBe(2);
        expect(Array.from(f.mask.bits)).toEqual([0, 1]);
    });
});

describe("overlap", () => {
    const a = maskFromRows(["....", ".##.", ".##.", "...."]);

    it("finds the first shared opaque pixel in a's coordinates", () => {
        const b = solidMask(2, 2);
        expect(overlap(a, b, { x: 2, y: 2 })).toEqual({ x: 2, y: 2 });
    });
    it("returns null when only transparent pixels meet", () => {
        const b = solidMask(2, 2);
        expect(overlap(a, b, { x: 3, y: 0 })).toBeNull();
    });
    it("returns null when the masks do not meet at all", () => {
        expect(overlap(a, solidMask(2, 2), { x: 10, y: 10 })).toBeNull();
    });
    it("handles negative offsets", () => {
        const b = solidMask(3, 3);
        expect(overlap(a, b, { x: -1, y: -1 })).toEqual({ x: 1, y: 1 });
    });
});
