/** ============================
 * Obstacle Stream (pure)
 *
 * One sweep per tick over the active pipes, oldest first.
 * ============================ */
import { advanceObstacle, collidesWith, isOffScreen } from "./pipe";
import type { Assets, Body, Obstacle } from "./types";

export type Sweep = Readonly<{
    obstacles: readonly Obstacle[];
    collided: boolean;
    passed: number; // pass events this tick, each worth a point and a pipe
}>;

/**
 * Collide, mark passes until the first collision, scroll, then retire the pipes that left the
 * screen. Retirement is collected in a side list during the sweep and
 * applied afterwards.
 */
export const sweepObstacles = (
    obstacles: readonly Obstacle[],
    body: Body,
    assets: Assets,
): Sweep => {
    type Acc = Readonly<{
        moved: Obstacle[];
        retired: Obstacle[];
        collided: boolean;
        passed: number;
    }>;

    const start: Acc = { moved: [], retired: [], collided: false, passed: 0 };

    const swept = obstacles.reduce<Acc>((acc, o) => {
        const collided = acc.collided || collidesWith(o, body, assets);
        // a crash ends the run, so nothing after it scores
        const passesNow = !collided && !o.passed && body.x > o.x;
        const moved = advanceObstacle(passesNow ? { ...o, passed: true } : o);
        return {
            moved: [...acc.moved, moved],
            retired: isOffScreen(moved, assets)
                ? [...acc.retired, moved]
                : acc.retired,
            collided,
            passed: acc.passed + (passesNow ? 1 : 0),
        };
    }, start);

    return {
        obstacles: swept.moved.filter(o => !swept.retired.includes(o)),
        collided: swept.collided,
        passed: swept.passed,
    };
};
