import { flipSprite, solidMask } from "../src/mask";
import type { Assets, Mask, Sprite } from "../src/types";

export const sprite = (href: string, mask: Mask): Sprite => ({
    href,
    width: mask.width,
    height: mask.height,
    mask,
});

/** Asset table with the reference sprite sizes and fully opaque masks */
export const makeAssets = (over: Partial<Assets> = {}): Assets => {
    const pipe = sprite("pipe", solidMask(104, 640));
    return {
        background: sprite("bg", solidMask(576, 1024)),
        ground: sprite("base", solidMask(672, 224)),
        pipeTop: flipSprite(pipe),
        pipeBottom: pipe,
        bird: [
            sprite("bird1", solidMask(68, 48)),
            sprite("bird2", solidMask(68, 48)),
            sprite("bird3", solidMask(68, 48)),
        ],
        ...over,
    };
};

export const noInput = { quit: false, jumpPressed: false } as const;
export const jumpInput = { quit: false, jumpPressed: true } as const;
export const quitInput = { quit: true, jumpPressed: false } as const;
