/** ============================
 * Constants
 * ============================ */
export const Viewport = {
    CANVAS_WIDTH: 500,
    CANVAS_HEIGHT: 800,
} as const;

export const Bird = {
    START_X: 230,
    START_Y: 350,
    MAX_ROTATION: 25,
    MIN_ROTATION: -90,
    ROTATION_SPEED: 20,
    GLIDE_ANGLE: -80, // at or below this the wings stop flapping
    ANIMATION_TIME: 5,
} as const;

export const Pipes = {
    SEED_X: 700,
    SPAWN_X: 600,
    DISTANCE: 200, // vertical gap between top and bottom pipe
    MIN_GAP_Y: 50,
    MAX_GAP_Y: 475, // exclusive
} as const;

export const Ground = {
    Y: 730,
} as const;

export const Constants = {
    TICK_RATE_MS: 1000 / 30, // 30 fps
    GAME_OVER_HOLD_MS: 3000,
    MASK_ALPHA_THRESHOLD: 127,
} as const;

export const Physics = {
    JUMP_VELOCITY: -10.5,
    GRAVITY_FACTOR: 1.5,
    TERMINAL_DISPLACEMENT: 16,
    UPWARD_SNAP: 2,
    SCROLL_SPEED: 5,
} as const;

/** ============================
 * Sprites & Masks
 * ============================ */
/** Mask: row-major opacity bitmap, 1 = opaque pixel */
export type Mask = Readonly<{
    width: number;
    height: number;
    bits: Uint8Array;
}>;

export type Sprite = Readonly<{
    href: string;
    width: number;
    height: number;
    mask: Mask;
}>;

export type BirdFrame = 0 | 1 | 2;

/** Assets: loaded once at startup and shared by every session */
export type Assets = Readonly<{
    background: Sprite;
    ground: Sprite;
    pipeTop: Sprite;
    pipeBottom: Sprite;
    bird: readonly [Sprite, Sprite, Sprite];
}>;

/** ============================
 * Core Game Types
 * ============================ */
/** Body: the bird. x is fixed, the world scrolls instead */
export type Body = Readonly<{
    x: number;
    y: number;
    speed: number; // impulse set at the last jump
    time: number; // ticks since the last jump
    jumpHeight: number; // y at the last jump
    angle: number;
    imageCount: number;
    frame: BirdFrame;
}>;

/** Obstacle: a top/bottom pipe pair around a gap */
export type Obstacle = Readonly<{
    x: number;
    gapHeight: number;
    top: number;
    bottom: number;
    passed: boolean;
}>;

/** GroundBelt: two tiles that wrap to follow each other */
export type GroundBelt = Readonly<{
    y: number;
    x1: number;
    x2: number;
    width: number;
}>;

export type Status = "Running" | "Ended";

export type EndCause = "collision" | "ground" | "ceiling";

/** Session: one play-through */
export type Session = Readonly<{
    status: Status;
    cause: EndCause | null;
    body: Body;
    obstacles: readonly Obstacle[];
    ground: GroundBelt;
    score: number;
    rngSeed: number;
    tickCount: number;
}>;

/** FrameInput: everything the player did since the previous tick */
export type FrameInput = Readonly<{
    quit: boolean;
    jumpPressed: boolean;
}>;
