/** ============================
 * Asset Table (browser)
 *
 * Sprites are loaded once at startup, rasterised on a canvas and turned
 * into collision masks. The resulting table is immutable and handed to
 * every session and to the view.
 * ============================ */
import { Observable, forkJoin, map } from "rxjs";
import { flipSprite, maskFromAlpha } from "./mask";
import type { Assets, Sprite } from "./types";

const assetUrl = (name: string): string =>
    `${import.meta.env.BASE_URL}assets/${name}.svg`;

/**
 * Load a sprite by name. Errors if the image cannot be fetched or
 * rasterised.
 */
export const loadImage = (name: string): Observable<Sprite> =>
    new Observable<Sprite>(subscriber => {
        const href = assetUrl(name);
        const img = new Image();

        img.onload = () => {
            const width = img.naturalWidth;
            const height = img.naturalHeight;
            const canvas = document.createElement("canvas");
            canvas.width = width;
            canvas.height = height;
            const ctx = canvas.getContext("2d");
            if (ctx === null) {
                subscriber.error(new Error(`No 2D context for image ${name}`));
                return;
            }
            ctx.drawImage(img, 0, 0, width, height);
            const { data } = ctx.getImageData(0, 0, width, height);
            subscriber.next({
                href,
                width,
                height,
                mask: maskFromAlpha(width, height, data),
            });
            subscriber.complete();
        };
        img.onerror = () =>
            subscriber.error(
                new Error(`Failed to load image ${name} (${href})`),
            );
        img.src = href;

        return () => {
            img.onload = null;
            img.onerror = null;
        };
    });

/** Every sprite the game draws, loaded in parallel */
export const loadAssets = (): Observable<Assets> =>
    forkJoin({
        background: loadImage("bg"),
        ground: loadImage("base"),
        pipe: loadImage("pipe"),
        bird1: loadImage("bird1"),
        bird2: loadImage("bird2"),
        bird3: loadImage("bird3"),
    }).pipe(
        map(({ background, ground, pipe, bird1, bird2, bird3 }) => ({
            background,
            ground,
            pipeTop: flipSprite(pipe),
            pipeBottom: pipe,
            bird: [bird1, bird2, bird3] as const,
        })),
    );
