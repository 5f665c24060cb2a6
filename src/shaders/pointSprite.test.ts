import { describe, it, expect } from "vitest";
import { pointSpriteVertexShader, pointSpriteFragmentShader } from "./pointSprite";
import { POINT_SIZE, POINT_COLOR, COLOR_VARYING } from "../stage/vertexStage";

function lines(source: string): string[] {
  return source.split("\n").map((line) => line.trim());
}

describe("pointSpriteVertexShader", () => {
  const src = lines(pointSpriteVertexShader);

  it("targets GLSL ES 3.00", () => {
    expect(src[0]).toBe("#version 300 es");
  });

  it("reads the position from input slot 0", () => {
    expect(src).toContain("layout(location = 0) in vec2 a_position;");
  });

  it("places the position in clip space with z = 0 and w = 1", () => {
    expect(src).toContain("gl_Position = vec4(a_position, 0.0, 1.0);");
  });

  it("writes the same point size as the CPU stage", () => {
    expect(POINT_SIZE).toBe(2);
    expect(src).toContain("gl_PointSize = 2.0;");
  });

  it("writes the same color as the CPU stage", () => {
    expect(POINT_COLOR).toEqual([1, 1, 1]);
    expect(src).toContain("v_color = vec3(1.0, 1.0, 1.0);");
  });

  it("declares the color varying without a location", () => {
    expect(COLOR_VARYING).toBe("v_color");
    expect(src).toContain(`out vec3 ${COLOR_VARYING};`);
  });
});

describe("pointSpriteFragmentShader", () => {
  it("consumes the color interpolant by name", () => {
    const src = lines(pointSpriteFragmentShader);

    expect(src).toContain(`in vec3 ${COLOR_VARYING};`);
    expect(src).toContain("fragColor = vec4(v_color, 1.0);");
  });
});
