/**
 * Entry point: loads the sprites, then runs sessions forever until the
 * player quits with Escape. Space flaps.
 */

import "./style.css";
import { catchError, fromEvent, interval, share, switchMap, tap } from "rxjs";
import { loadAssets } from "./assets";
import { game$, input$, sessionLog } from "./observable";
import { Constants } from "./types";
import { freshSeed } from "./util";
import { render } from "./view";

// Re-exports for tests and consumers
export * from "./types";
export * from "./state";
export { game$, input$, session$, sessionLog } from "./observable";

if (typeof window !== "undefined") {
    const inputs$ = input$(
        interval(Constants.TICK_RATE_MS),
        fromEvent<KeyboardEvent>(window, "keydown"),
    ).pipe(share());

    const sessions$ = loadAssets().pipe(
        catchError((err: unknown) => {
            console.error("Error loading sprites:", err);
            throw err;
        }),
        switchMap(assets =>
            game$(assets, inputs$, () => freshSeed(Date.now())).pipe(
                tap(render(assets)),
            ),
        ),
    );

    sessionLog(sessions$).subscribe({
        next: line => console[line.level](line.text),
        complete: () => console.info("Quit."),
    });
}
