/** ============================
 * Pixel Masks
 *
 * Opacity bitmaps for exact (non bounding-box) collision tests.
 * ============================ */
import { Constants, type Mask, type Sprite } from "./types";

export type Point = Readonly<{ x: number; y: number }>;

/**
 * Builds a mask from RGBA pixel data (as returned by `getImageData`).
 * A pixel is opaque when its alpha is above the threshold.
 */
export const maskFromAlpha = (
    width: number,
    height: number,
    rgba: ArrayLike<number>,
    threshold: number = Constants.MASK_ALPHA_THRESHOLD,
): Mask => {
    const bits = new Uint8Array(width * height);
    for (let i = 0; i < bits.length; i++) {
        bits[i] = rgba[i * 4 + 3] > threshold ? 1 : 0;
    }
    return { width, height, bits };
};

/** Builds a mask from rows of text, `#` marks an opaque pixel */
export const maskFromRows = (rows: readonly string[]): Mask => {
    const height = rows.length;
    const width = height === 0 ? 0 : rows[0].length;
    const bits = new Uint8Array(width * height);
    rows.forEach((row, y) =>
        [...row].forEach((c, x) => {
            bits[y * width + x] = c === "#" ? 1 : 0;
        }),
    );
    return { width, height, bits };
};

/** Fully opaque rectangle */
export const solidMask = (width: number, height: number): Mask => ({
    width,
    height,
    bits: new Uint8Array(width * height).fill(1),
});

export const isSet = (m: Mask, x: number, y: number): boolean =>
    x >= 0 && y >= 0 && x < m.width && y < m.height
        ? m.bits[y * m.width + x] === 1
        : false;

/** Mirror a mask top to bottom */
export const flipVertical = (m: Mask): Mask => {
    const bits = new Uint8Array(m.bits.length);
    for (let y = 0; y < m.height; y++) {
        const src = (m.height - 1 - y) * m.width;
        bits.set(m.bits.subarray(src, src + m.width), y * m.width);
    }
    return { width: m.width, height: m.height, bits };
};

/** Sprite drawn upside down; the view flips the image, this flips the mask */
export const flipSprite = (s: Sprite): Sprite => ({
    ...s,
    mask: flipVertical(s.mask),
});

/**
 * First opaque pixel shared by `a` and `b`, where `b` is placed at
 * `offset` relative to `a`'s top-left corner. Coordinates are in `a`'s
 * space. Returns null when nothing overlaps.
 */
export const overlap = (a: Mask, b: Mask, offset: Point): Point | null => {
    const x0 = Math.max(0, offset.x);
    const y0 = Math.max(0, offset.y);
    const x1 = Math.min(a.width, offset.x + b.width);
    const y1 = Math.min(a.height, offset.y + b.height);
    for (let y = y0; y < y1; y++) {
        for (let x = x0; x < x1; x++) {
            if (isSet(a, x, y) && isSet(b, x - offset.x, y - offset.y))
                return { x, y };
        }
    }
    return null;
};
