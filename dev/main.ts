import { PointSprites, VERSION } from "../src/index";

console.log(`Point sprites v${VERSION}`);

const canvas = document.getElementById("canvas");
if (!(canvas instanceof HTMLCanvasElement)) {
  throw new Error("Missing #canvas element");
}

// ?count=50000&seed=3&debug
const params = new URLSearchParams(window.location.search);
const count = params.get("count");
const seed = params.get("seed");

const sprites = new PointSprites({
  canvas,
  particleCount: count !== null ? Number(count) : undefined,
  seed: seed !== null ? Number(seed) : undefined,
  debug: params.has("debug"),
});

sprites.start();

window.addEventListener("resize", () => sprites.requestRender());
window.addEventListener("beforeunload", () => sprites.destroy());
