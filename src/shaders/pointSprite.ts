/**
 * Point Sprite Shaders
 *
 * The vertex stage places each 2D position straight into clip space and
 * emits a fixed-size white point. No matrix is applied.
 */

/**
 * Point-sprite vertex shader.
 *
 * Attributes:
 * - a_position (location 0): clip-space x, y
 *
 * Outputs:
 * - gl_Position: (x, y, 0, 1)
 * - gl_PointSize: 2.0
 * - v_color: white (the only varying, matched to the fragment stage by name)
 */
export const pointSpriteVertexShader = `#version 300 es
precision highp float;

layout(location = 0) in vec2 a_position;

out vec3 v_color;

void main() {
  gl_Position = vec4(a_position, 0.0, 1.0);
  gl_PointSize = 2.0;
  v_color = vec3(1.0, 1.0, 1.0);
}
`;

/**
 * Point-sprite fragment shader.
 * Outputs the interpolated color, fully opaque.
 */
export const pointSpriteFragmentShader = `#version 300 es
precision mediump float;

in vec3 v_color;
out vec4 fragColor;

void main() {
  fragColor = vec4(v_color, 1.0);
}
`;
