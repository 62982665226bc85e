/** ============================
 * Observable Wiring
 *
 * Stream composition only: maps inputs/time to the pure session reducer
 * folded by scan. No DOM here.
 * ============================ */
import {
    Observable,
    buffer,
    concat,
    defer,
    filter,
    ignoreElements,
    map,
    mergeMap,
    repeat,
    scan,
    takeUntil,
    takeWhile,
    timer,
} from "rxjs";
import { initialSession, step } from "./state";
import {
    type Assets,
    Bird,
    Constants,
    type FrameInput,
    Physics,
    type Session,
} from "./types";

type Key = "Space" | "Escape";

/** The parts of a keyboard event the game looks at */
export type KeyPress = Pick<KeyboardEvent, "code" | "key">;

/** Map a key press to a game key; everything else is ignored */
const toKey = (e: KeyPress): Key | null => {
    if (e.code === "Space" || e.key === " " || e.key === "Spacebar")
        return "Space";
    if (e.code === "Escape" || e.key === "Escape" || e.key === "Esc")
        return "Escape";
    return null;
};

/**
 * Per-tick input: key presses are buffered between ticks and drained
 * once per tick, so any number of presses in one tick is one jump.
 */
export const input$ = (
    tick$: Observable<unknown>,
    key$: Observable<KeyPress>,
): Observable<FrameInput> =>
    key$.pipe(
        map(toKey),
        filter((k): k is Key => k !== null),
        buffer(tick$),
        map(keys => ({
            quit: keys.includes("Escape"),
            jumpPressed: keys.includes("Space"),
        })),
    );

/**
 * One play-through: folds the reducer over the inputs and completes right
 * after the Ended state. A quit input stops it without another step.
 */
export const session$ = (
    assets: Assets,
    inputs: Observable<FrameInput>,
    seed: number,
): Observable<Session> =>
    inputs.pipe(
        takeWhile(i => !i.quit),
        scan(step(assets), initialSession(assets, seed)),
        takeWhile(s => s.status === "Running", true),
    );

/**
 * Supervisory loop: run a session, hold the game-over screen, then start
 * a fresh session from a new seed. Completes on quit.
 */
export const game$ = (
    assets: Assets,
    inputs: Observable<FrameInput>,
    nextSeed: () => number,
    holdMs: number = Constants.GAME_OVER_HOLD_MS,
): Observable<Session> =>
    defer(() =>
        concat(
            session$(assets, inputs, nextSeed()),
            timer(holdMs).pipe(ignoreElements()),
        ),
    ).pipe(
        repeat(),
        takeUntil(inputs.pipe(filter(i => i.quit))),
    );

export type LogLine = Readonly<{ level: "info" | "debug"; text: string }>;

const info = (text: string): LogLine => ({ level: "info", text });
const debug = (text: string): LogLine => ({ level: "debug", text });

/** Log lines for the change from `prev` to `s`, oldest event first */
export const describeChange = (
    prev: Session | null,
    s: Session,
): readonly LogLine[] => {
    if (s.status === "Ended")
        return [info(`Game over (${s.cause ?? "unknown"}). Score: ${s.score}`)];
    const started =
        s.tickCount === 1
            ? [
                  info("Game started."),
                  info(
                      `Bird initialized at position (${Bird.START_X}, ${Bird.START_Y}).`,
                  ),
              ]
            : [];
    // a jump restarts the arc, so the bird is one tick into it
    const jumped =
        s.body.time === 1 && s.body.speed === Physics.JUMP_VELOCITY
            ? [debug("Bird jumped.")]
            : [];
    const scored =
        prev !== null && s.score > prev.score
            ? [info(`Score updated: ${s.score}`)]
            : [];
    return [...started, ...jumped, ...scored];
};

type LogAcc = Readonly<{ prev: Session | null; lines: readonly LogLine[] }>;

/** Stream of log lines for a stream of session states */
export const sessionLog = (
    sessions: Observable<Session>,
): Observable<LogLine> =>
    sessions.pipe(
        scan<Session, LogAcc>(
            (acc, s) => ({ prev: s, lines: describeChange(acc.prev, s) }),
            { prev: null, lines: [] },
        ),
        mergeMap(acc => acc.lines),
    );
