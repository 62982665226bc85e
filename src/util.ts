/** ============================
 * DOM / SVG Utilities (side-effect helpers)
 * ============================ */
/**
 * Displays a SVG element on the canvas, on top of its siblings.
 * @param elem SVG element to display
 */
export const show = (elem: SVGElement): void => {
    elem.setAttribute("visibility", "visible");
    elem.parentNode?.appendChild(elem);
};

/**
 * Hides a SVG element on the canvas.
 * @param elem SVG element to hide
 */
export const hide = (elem: SVGElement): void => {
    elem.setAttribute("visibility", "hidden");
};

/**
 * Creates an SVG element with the given attributes.
 *
 * See https://developer.mozilla.org/en-US/docs/Web/SVG/Element for valid
 * element names and attributes.
 *
 * @param name SVGElement name
 * @param props Attributes to set on the element
 */
export const createSvgElement = <K extends keyof SVGElementTagNameMap>(
    name: K,
    props: Record<string, string> = {},
): SVGElementTagNameMap[K] => {
    const elem = document.createElementNS("http://www.w3.org/2000/svg", name);
    Object.entries(props).forEach(([k, v]) => elem.setAttribute(k, v));
    return elem;
};

/**
 * A random number generator which provides two pure functions
 * `hash` and `unit`. Call `hash` repeatedly to generate the
 * sequence of hashes.
 */
abstract class RNG {
    private static m = 0x80000000; // 2^31
    private static a = 1103515245;
    private static c = 12345;

    // low 31 bits of a * seed + c, exact for any 32-bit integer seed
    public static hash = (seed: number): number =>
        (Math.imul(RNG.a, seed) + RNG.c) & (RNG.m - 1);
    public static unit = (hash: number): number => hash / RNG.m; // [0,1)
}

/**
 * Uniform integer in [min, max), threaded through the seed.
 */
export const randInt = (seed: number, min: number, max: number) => {
    const next = RNG.hash(seed);
    return { v: min + Math.floor(RNG.unit(next) * (max - min)), seed: next };
};

/** Seed for a new session, kept inside the generator's range */
export const freshSeed = (now: number): number => Math.floor(now) % 0x80000000;
