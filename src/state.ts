/** ============================
 * Pure State (Session Reducers)
 *
 * Holds only pure, deterministic functions that transform the immutable
 * Session. No DOM, IO, or time APIs.
 * ============================ */
import { advanceBody, animate, bodyHeight, createBody, jump } from "./body";
import { advanceGround, createGround } from "./ground";
import { createObstacle } from "./pipe";
import { sweepObstacles } from "./stream";
import {
    type Assets,
    Bird,
    type EndCause,
    type FrameInput,
    Ground,
    type Obstacle,
    Pipes,
    type Session,
} from "./types";

/**
 * Fresh running session: bird at its start position, one pipe ahead.
 */
export const initialSession = (assets: Assets, seed: number): Session => {
    const first = createObstacle(Pipes.SEED_X, seed, assets);
    return {
        status: "Running",
        cause: null,
        body: createBody(Bird.START_X, Bird.START_Y),
        obstacles: [first.obstacle],
        ground: createGround(Ground.Y, assets.ground.width),
        score: 0,
        rngSeed: first.seed,
        tickCount: 0,
    };
};

type Spawned = { obstacles: Obstacle[]; seed: number };

/** Spawn `count` pipes at the spawn line, threading the seed */
const spawnObstacles = (count: number, seed: number, assets: Assets): Spawned =>
    Array.from({ length: count }).reduce<Spawned>(
        acc => {
            const next = createObstacle(Pipes.SPAWN_X, acc.seed, assets);
            return {
                obstacles: [...acc.obstacles, next.obstacle],
                seed: next.seed,
            };
        },
        { obstacles: [], seed },
    );

/**
 * Boundary check: bird below the ground line or above the screen.
 */
export const endCause = (s: Session, assets: Assets): EndCause | null => {
    if (s.body.y + bodyHeight(s.body, assets) > s.ground.y) return "ground";
    if (s.body.y < 0) return "ceiling";
    return null;
};

/** One discrete time-step; an ended session is left untouched */
export const step =
    (assets: Assets) =>
    (s: Session, input: FrameInput): Session => {
        if (s.status === "Ended") return s;

        const body = advanceBody(input.jumpPressed ? jump(s.body) : s.body);
        const ground = advanceGround(s.ground);
        const sweep = sweepObstacles(s.obstacles, body, assets);
        if (sweep.collided)
            return {
                ...s,
                body,
                ground,
                obstacles: sweep.obstacles,
                tickCount: s.tickCount + 1,
                status: "Ended",
                cause: "collision",
            };

        const spawned = spawnObstacles(sweep.passed, s.rngSeed, assets);

        const moved: Session = {
            ...s,
            body,
            ground,
            obstacles: [...sweep.obstacles, ...spawned.obstacles],
            score: s.score + sweep.passed,
            rngSeed: spawned.seed,
            tickCount: s.tickCount + 1,
        };

        const cause = endCause(moved, assets);
        return cause === null
            ? { ...moved, body: animate(moved.body) }
            : { ...moved, status: "Ended", cause };
    };
