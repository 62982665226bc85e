/** ============================
 * Pipe Pairs (pure)
 * ============================ */
import { overlap } from "./mask";
import { occupiedRegion } from "./body";
import { type Assets, type Body, type Obstacle, Physics, Pipes } from "./types";
import { randInt } from "./util";

/** Pipe pair at `x` whose gap sits at `gapHeight` */
export const obstacleWithGap = (
    x: number,
    gapHeight: number,
    assets: Assets,
): Obstacle => ({
    x,
    gapHeight,
    top: gapHeight - assets.pipeTop.height,
    bottom: gapHeight + Pipes.DISTANCE,
    passed: false,
});

/** Pipe pair at `x` with a random gap; returns the advanced seed */
export const createObstacle = (x: number, seed: number, assets: Assets) => {
    const r = randInt(seed, Pipes.MIN_GAP_Y, Pipes.MAX_GAP_Y);
    return { obstacle: obstacleWithGap(x, r.v, assets), seed: r.seed };
};

export const advanceObstacle = (o: Obstacle): Obstacle => ({
    ...o,
    x: o.x - Physics.SCROLL_SPEED,
});

/**
 * Pixel-exact test of the bird against both pipes.
 */
export const collidesWith = (
    o: Obstacle,
    body: Body,
    assets: Assets,
): boolean => {
    const birdMask = occupiedRegion(body, assets);
    const dx = o.x - body.x;
    const y = Math.round(body.y);
    const topPoint = overlap(birdMask, assets.pipeTop.mask, {
        x: dx,
        y: o.top - y,
    });
    const bottomPoint = overlap(birdMask, assets.pipeBottom.mask, {
        x: dx,
        y: o.bottom - y,
    });
    return topPoint !== null || bottomPoint !== null;
};

/** True once the pipe has scrolled fully past the left edge */
export const isOffScreen = (o: Obstacle, assets: Assets): boolean =>
    o.x + assets.pipeTop.width < 0;
