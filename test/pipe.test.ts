import { describe, it, expect } from "vitest";
import { createBody } from "../src/body";
import { flipSprite, maskFromRows, solidMask } from "../src/mask";
import {
    advanceObstacle,
    collidesWith,
    createObstacle,
    isOffScreen,
    obstacleWithGap,
} from "../src/pipe";
import type { Obstacle } from "../src/types";
import { makeAssets, sprite } from "./fixtures";

const assets = makeAssets();

describe("createObstacle", () => {
    it("draws gap heights within [50, 475) and derives both edges", () => {
        const draws = Array.from({ length: 1000 }).reduce<{
            seed: number;
            all: Obstacle[];
        }>(
            acc => {
                const r = createObstacle(300, acc.seed, assets);
                return { seed: r.seed, all: [...acc.all, r.obstacle] };
            },
            { seed: 20240101, all: [] },
        ).all;

        draws.forEach(o => {
            expect(Number.isInteger(o.gapHeight)).toBe(true);
            expect(o.gapHeight).toBeGreaterThanOrEqual(50);
            expect(o.gapHeight).toBeLessThan(475);
            expect(o.top).toBe(o.gapHeight - 640);
            expect(o.bottom).toBe(o.gapHeight + 200);
            expect(o.x).toBe(300);
            expect(o.passed).toBe(false);
        });
        expect(new Set(draws.map(o => o.gapHeight)).size).toBeGreaterThan(100);
    });

    it("is deterministic for a seed", () => {
        const a = createObstacle(700, 42, assets);
        const b = createObstacle(700, 42, assets);
        expect(a).toEqual(b);
        expect(a.seed).not.toBe(42);
    });
});

describe("advanceObstacle", () => {
    it("scrolls left by exactly 5 regardless of the gap", () => {
        [60, 260, 470].forEach(gap => {
            const o = obstacleWithGap(300, gap, assets);
            expect(advanceObstacle(o).x).toBe(295);
            expect(advanceObstacle(o).gapHeight).toBe(gap);
        });
    });

    it("a pipe with gap 260 has edges -380/460 and moves 200 in 40 ticks", () => {
        const o = obstacleWithGap(700, 260, assets);
        expect(o.top).toBe(260 - assets.pipeTop.height);
        expect(o.top).toBe(-380);
        expect(o.bottom).toBe(460);
        const moved = Array.from({ length: 40 }).reduce<Obstacle>(
            acc => advanceObstacle(acc),
            o,
        );
        expect(moved.x).toBe(500);
    });
});

describe("isOffScreen", () => {
    it("retires once the right edge is past the left boundary", () => {
        const o = obstacleWithGap(0, 100, assets);
        expect(isOffScreen({ ...o, x: -104 }, assets)).toBe(false);
        expect(isOffScreen({ ...o, x: -105 }, assets)).toBe(true);
    });
});

describe("collidesWith (pixel masks)", () => {
    // 4x4 bird with a 2x2 opaque core, 6x10 solid pipes
    const pipe = sprite("pipe", solidMask(6, 10));
    const birdSprite = sprite("bird", maskFromRows(["....", ".##.", ".##.", "...."]));
    const tiny = makeAssets({
        pipeTop: flipSprite(pipe),
        pipeBottom: pipe,
        bird: [birdSprite, birdSprite, birdSprite],
    });
    // top pipe covers rows 20..29, bottom pipe starts at row 230
    const o = obstacleWithGap(8, 30, tiny);

    it("reports no collision for a bird inside the gap", () => {
        expect(collidesWith(o, createBody(10, 100), tiny)).toBe(false);
    });

    it("reports a collision when opaque pixels meet the top pipe", () => {
        expect(collidesWith(o, createBody(10, 28), tiny)).toBe(true);
    });

    it("ignores transparent border pixels that overlap the pipe", () => {
        // bounding box row 29 touches the pipe, opaque rows start at 30
        expect(collidesWith(o, createBody(10, 29), tiny)).toBe(false);
    });

    it("reports a collision against the bottom pipe", () => {
        expect(collidesWith(o, createBody(10, 228), tiny)).toBe(true);
        expect(collidesWith(o, createBody(10, 227), tiny)).toBe(false);
    });

    it("rounds the bird's y before testing", () => {
        expect(collidesWith(o, createBody(10, 28.4), tiny)).toBe(true);
        expect(collidesWith(o, createBody(10, 28.6), tiny)).toBe(false);
    });

    it("reports no collision when the pipe is horizontally clear", () => {
        expect(collidesWith({ ...o, x: 13 }, createBody(10, 28), tiny)).toBe(
            false,
        );
    });
});
