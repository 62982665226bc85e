/** ============================
 * Scrolling Ground (pure)
 * ============================ */
import { type GroundBelt, Physics } from "./types";

export const createGround = (y: number, width: number): GroundBelt => ({
    y,
    x1: 0,
    x2: width,
    width,
});

/**
 * Scroll both tiles left; a tile that has left the screen jumps to
 * just behind the other one.
 */
export const advanceGround = (g: GroundBelt): GroundBelt => {
    const x1 = g.x1 - Physics.SCROLL_SPEED;
    const x2 = g.x2 - Physics.SCROLL_SPEED;
    const w1 = x1 + g.width < 0 ? x2 + g.width : x1;
    const w2 = x2 + g.width < 0 ? w1 + g.width : x2;
    return { ...g, x1: w1, x2: w2 };
};
