/**
 * Shader compilation utilities
 */

/** Attribute name to vertex input slot */
export type AttributeLocations = Readonly<Record<string, number>>;

/** Compile a shader from source */
export function compileShader(
  gl: WebGL2RenderingContext,
  type: number,
  source: string
): WebGLShader {
  const shader = gl.createShader(type);
  if (!shader) {
    throw new Error("Failed to create shader");
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader);
    gl.deleteShader(shader);
    throw new Error(`Shader compilation failed: ${log}`);
  }

  return shader;
}

/**
 * Create and link a shader program.
 *
 * Attributes listed in `attributeLocations` are bound before linking, so the
 * program agrees with the host's vertex layout even when the source leaves
 * a location unqualified.
 */
export function createProgram(
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string,
  attributeLocations: AttributeLocations = {}
): WebGLProgram {
  const vs = compileShader(gl, gl.VERTEX_SHADER, vertexSource);
  let fs: WebGLShader;
  try {
    fs = compileShader(gl, gl.FRAGMENT_SHADER, fragmentSource);
  } catch (err) {
    gl.deleteShader(vs);
    throw err;
  }

  const program = gl.createProgram();
  if (!program) {
    gl.deleteShader(vs);
    gl.deleteShader(fs);
    throw new Error("Failed to create program");
  }

  gl.attachShader(program, vs);
  gl.attachShader(program, fs);
  for (const [name, location] of Object.entries(attributeLocations)) {
    gl.bindAttribLocation(program, location, name);
  }
  gl.linkProgram(program);

  // Linked or not, the stage objects are no longer needed
  gl.deleteShader(vs);
  gl.deleteShader(fs);

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program);
    gl.deleteProgram(program);
    throw new Error(`Program linking failed: ${log}`);
  }

  return program;
}

/**
 * Verify a linked program reads `name` from the expected input slot.
 * A mismatch means the host's vertex buffer layout would feed the wrong data.
 */
export function assertAttributeLocation(
  gl: WebGL2RenderingContext,
  program: WebGLProgram,
  name: string,
  location: number
): void {
  const actual = gl.getAttribLocation(program, name);
  if (actual !== location) {
    throw new Error(
      `Attribute ${name} is bound to location ${actual}, expected ${location}`
    );
  }
}
