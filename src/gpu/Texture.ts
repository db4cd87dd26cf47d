/**
 * WebGL texture wrapper with lifecycle management
 */

export type TextureKind = "2d" | "2dArray";
export type TextureFilter = "nearest" | "linear";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_TEXTURE_2D = 0x0de1;
const GL_TEXTURE_2D_ARRAY = 0x8c1a;
const GL_NEAREST = 0x2600;
const GL_LINEAR = 0x2601;
const GL_TEXTURE0 = 0x84c0;

const KIND_MAP: Record<TextureKind, GLenum> = {
  "2d": GL_TEXTURE_2D,
  "2dArray": GL_TEXTURE_2D_ARRAY,
};

const FILTER_MAP: Record<TextureFilter, GLenum> = {
  nearest: GL_NEAREST,
  linear: GL_LINEAR,
};

export class Texture {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLTexture;
  readonly target: GLenum;
  readonly filter: GLenum;

  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, kind: TextureKind, filter: TextureFilter) {
    this.gl = gl;
    this.target = KIND_MAP[kind];
    this.filter = FILTER_MAP[filter];

    const handle = gl.createTexture();
    if (!handle) {
      throw new Error("Failed to create WebGL texture");
    }
    this.handle = handle;

    gl.bindTexture(this.target, handle);
    gl.texParameteri(this.target, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE);
    gl.texParameteri(this.target, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE);
    gl.texParameteri(this.target, gl.TEXTURE_MIN_FILTER, this.filter);
    gl.texParameteri(this.target, gl.TEXTURE_MAG_FILTER, this.filter);
  }

  /** Bind this texture to a texture unit */
  bind(unit: number): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed texture");
    }
    this.gl.activeTexture(GL_TEXTURE0 + unit);
    this.gl.bindTexture(this.target, this.handle);
  }

  /** Upload float RGBA texels (2D textures only) */
  setFloatData(width: number, height: number, data: Float32Array): void {
    if (this._destroyed) {
      throw new Error("Cannot set data on destroyed texture");
    }
    const gl = this.gl;
    gl.bindTexture(this.target, this.handle);
    gl.texImage2D(this.target, 0, gl.RGBA32F, width, height, 0, gl.RGBA, gl.FLOAT, data);
  }

  /** Upload RGBA8 layers (array textures only) */
  setLayers(width: number, height: number, layers: number, data: Uint8Array): void {
    if (this._destroyed) {
      throw new Error("Cannot set data on destroyed texture");
    }
    const gl = this.gl;
    gl.bindTexture(this.target, this.handle);
    gl.texImage3D(this.target, 0, gl.RGBA8, width, height, layers, 0, gl.RGBA, gl.UNSIGNED_BYTE, data);
  }

  /** Delete the texture and release GPU memory */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteTexture(this.handle);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
