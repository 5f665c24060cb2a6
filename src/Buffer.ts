/**
 * WebGL vertex buffer wrapper with lifecycle management
 */

export type BufferUsage = "static" | "dynamic" | "stream";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_ARRAY_BUFFER = 0x8892;
const GL_STATIC_DRAW = 0x88e4;
const GL_DYNAMIC_DRAW = 0x88e8;
const GL_STREAM_DRAW = 0x88e0;

const USAGE_MAP: Record<BufferUsage, GLenum> = {
  static: GL_STATIC_DRAW,
  dynamic: GL_DYNAMIC_DRAW,
  stream: GL_STREAM_DRAW,
};

/** An ARRAY_BUFFER holding per-vertex attribute data */
export class Buffer {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLBuffer;
  readonly target: GLenum = GL_ARRAY_BUFFER;
  readonly usage: GLenum;

  private _byteLength = 0;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, usage: BufferUsage = "static") {
    this.gl = gl;
    this.usage = USAGE_MAP[usage];

    const handle = gl.createBuffer();
    if (!handle) {
      throw new Error("Failed to create WebGL buffer");
    }
    this.handle = handle;
  }

  /** Bind this buffer to ARRAY_BUFFER */
  bind(): void {
    this.assertAlive("bind");
    this.gl.bindBuffer(this.target, this.handle);
  }

  /** Unbind ARRAY_BUFFER */
  unbind(): void {
    this.gl.bindBuffer(this.target, null);
  }

  /** Replace the buffer's storage with `data` */
  setData(data: AllowSharedBufferSource): void {
    this.assertAlive("set data on");
    this.bind();
    this.gl.bufferData(this.target, data, this.usage);
    this._byteLength = data.byteLength;
  }

  /**
   * Overwrite part of the existing storage.
   * @param offset - Destination byte offset
   */
  updateData(data: AllowSharedBufferSource, offset: number = 0): void {
    this.assertAlive("update data on");
    if (offset < 0 || offset + data.byteLength > this._byteLength) {
      throw new Error(
        `Buffer update out of range: ${data.byteLength} bytes at offset ${offset}, size ${this._byteLength}`
      );
    }
    this.bind();
    this.gl.bufferSubData(this.target, offset, data);
  }

  /** Delete the buffer and release GPU memory */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteBuffer(this.handle);
    this._byteLength = 0;
    this._destroyed = true;
  }

  /** Size of the current storage in bytes */
  get byteLength(): number {
    return this._byteLength;
  }

  /** Check if buffer has been destroyed */
  get destroyed(): boolean {
    return this._destroyed;
  }

  private assertAlive(action: string): void {
    if (this._destroyed) {
      throw new Error(`Cannot ${action} destroyed buffer`);
    }
  }
}
