/** ============================
 * View (DOM/SVG Renderer)
 *
 * Session in → side-effectful DOM updates out. All rendering logic
 * is contained here to keep the reducers pure.
 * ============================ */
import {
    type Assets,
    type Obstacle,
    type Session,
    type Sprite,
    Viewport,
} from "./types";
import { createSvgElement, hide, show } from "./util";

const image = (sprite: Sprite, props: Record<string, string> = {}) =>
    createSvgElement("image", {
        href: sprite.href,
        width: `${sprite.width}`,
        height: `${sprite.height}`,
        ...props,
    });

const FLIP = "scale(1 -1)";

/** Top pipe is the bottom sprite mirrored around its own middle */
const pipePair = (assets: Assets, o: Obstacle): SVGImageElement[] => [
    image(assets.pipeTop, {
        transform: `translate(${o.x} ${o.top + assets.pipeTop.height}) ${FLIP}`,
    }),
    image(assets.pipeBottom, { x: `${o.x}`, y: `${o.bottom}` }),
];

export const render = (assets: Assets): ((s: Session) => void) => {
    const svg = document.querySelector<SVGSVGElement>("#svgCanvas");
    if (svg === null) throw new Error("Missing #svgCanvas element");

    svg.setAttribute(
        "viewBox",
        `0 0 ${Viewport.CANVAS_WIDTH} ${Viewport.CANVAS_HEIGHT}`,
    );

    // Back to front: background, bird, pipes, score, ground
    const background = image(assets.background);
    const bird = image(assets.bird[0]);
    const pipeGroup = createSvgElement("g");
    const scoreText = createSvgElement("text", {
        x: `${Viewport.CANVAS_WIDTH - 10}`,
        y: "60",
        "text-anchor": "end",
        class: "score",
    });
    const ground1 = image(assets.ground);
    const ground2 = image(assets.ground);

    const gameOver = createSvgElement("g", { visibility: "hidden" });
    const gameOverText = createSvgElement("text", {
        x: `${Viewport.CANVAS_WIDTH / 2}`,
        y: `${Viewport.CANVAS_HEIGHT / 2}`,
        "text-anchor": "middle",
        "dominant-baseline": "middle",
        class: "gameOver",
    });
    gameOver.append(image(assets.background), gameOverText);

    svg.append(
        background,
        bird,
        pipeGroup,
        scoreText,
        ground1,
        ground2,
        gameOver,
    );

    return (s: Session) => {
        if (s.status === "Ended") {
            gameOverText.textContent = `Game Over! Score: ${s.score}`;
            show(gameOver);
            return;
        }
        hide(gameOver);

        // Bird, rotated about its centre; collision ignores the rotation
        const frame = assets.bird[s.body.frame];
        const cx = s.body.x + frame.width / 2;
        const cy = s.body.y + frame.height / 2;
        bird.setAttribute("href", frame.href);
        bird.setAttribute("x", `${s.body.x}`);
        bird.setAttribute("y", `${s.body.y}`);
        bird.setAttribute("transform", `rotate(${-s.body.angle} ${cx} ${cy})`);

        pipeGroup.replaceChildren(
            ...s.obstacles.flatMap(o => pipePair(assets, o)),
        );

        scoreText.textContent = `Score: ${s.score}`;

        ground1.setAttribute("x", `${s.ground.x1}`);
        ground1.setAttribute("y", `${s.ground.y}`);
        ground2.setAttribute("x", `${s.ground.x2}`);
        ground2.setAttribute("y", `${s.ground.y}`);
    };
};
