/** ============================
 * Bird Flight Model (pure)
 *
 * The bird never moves horizontally; only y, the tilt and the wing
 * animation change from tick to tick.
 * ============================ */
import {
    type Assets,
    Bird,
    type BirdFrame,
    type Body,
    type Mask,
    Physics,
} from "./types";

export const createBody = (x: number, y: number): Body => ({
    x,
    y,
    speed: 0,
    time: 0,
    jumpHeight: y,
    angle: 0,
    imageCount: 0,
    frame: 0,
});

/** Upward impulse; restarts the flight arc from the current height */
export const jump = (b: Body): Body => ({
    ...b,
    speed: Physics.JUMP_VELOCITY,
    time: 0,
    jumpHeight: b.y,
});

/**
 * Vertical displacement `time` ticks into an arc started with `speed`.
 * Falling is capped; rising gets an extra upward snap.
 */
export const displacement = (time: number, speed: number): number => {
    const d = Physics.GRAVITY_FACTOR * time * time + speed * time;
    if (d > Physics.TERMINAL_DISPLACEMENT) return Physics.TERMINAL_DISPLACEMENT;
    return d < 0 ? d - Physics.UPWARD_SNAP : d;
};

/**
 * One tick of flight.
 * Tilts up while rising or still near the jump height, otherwise noses
 * down by ROTATION_SPEED per tick until MIN_ROTATION.
 */
export const advanceBody = (b: Body): Body => {
    const time = b.time + 1;
    const d = displacement(time, b.speed);
    const y = b.y + d;
    const angle =
        d < 0 || y < b.jumpHeight + 50
            ? Math.max(b.angle, Bird.MAX_ROTATION)
            : Math.max(b.angle - Bird.ROTATION_SPEED, Bird.MIN_ROTATION);
    return { ...b, time, y, angle };
};

const CYCLE: readonly BirdFrame[] = [0, 1, 2, 1];

/**
 * Wing animation: frames 0,1,2,1 for ANIMATION_TIME ticks each, then the
 * cycle restarts. While diving the bird glides on frame 1.
 */
export const animate = (b: Body): Body => {
    const T = Bird.ANIMATION_TIME;
    if (b.angle <= Bird.GLIDE_ANGLE)
        return { ...b, frame: 1, imageCount: T * 2 };

    const count = b.imageCount + 1;
    if (count < T * 4)
        return { ...b, imageCount: count, frame: CYCLE[Math.floor(count / T)] };
    if (count === T * 4) return { ...b, imageCount: count };
    return { ...b, imageCount: 0, frame: 0 };
};

/** Mask of the current frame; rotation is cosmetic and ignored here */
export const occupiedRegion = (b: Body, assets: Assets): Mask =>
    assets.bird[b.frame].mask;

/** Height of the current frame's sprite */
export const bodyHeight = (b: Body, assets: Assets): number =>
    assets.bird[b.frame].height;
