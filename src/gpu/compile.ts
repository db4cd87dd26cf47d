/**
 * Shader compilation for the GPU interpreter
 */

export type ShaderStage = "vertex" | "fragment";

/** Compile one stage; `label` names the program in errors */
export function compileShader(
  gl: WebGL2RenderingContext,
  stage: ShaderStage,
  source: string,
  label = "interpreter"
): WebGLShader {
  const shader = gl.createShader(stage === "vertex" ? gl.VERTEX_SHADER : gl.FRAGMENT_SHADER);
  if (!shader) {
    throw new Error(`Failed to create ${label} ${stage} shader`);
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader) ?? "";
    gl.deleteShader(shader);
    console.error(`[compileShader] ${label} ${stage} shader failed to compile:\n${log}`);
    throw new Error(`Failed to compile ${label} ${stage} shader: ${log}`);
  }

  return shader;
}

/**
 * Compile both stages and link them. Shaders are released on every path;
 * a failed link also releases the program.
 */
export function createProgram(
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string,
  label = "interpreter"
): WebGLProgram {
  const vs = compileShader(gl, "vertex", vertexSource, label);
  let fs: WebGLShader;
  try {
    fs = compileShader(gl, "fragment", fragmentSource, label);
  } catch (err) {
    gl.deleteShader(vs);
    throw err;
  }

  try {
    const program = gl.createProgram();
    if (!program) {
      throw new Error(`Failed to create ${label} program`);
    }

    gl.attachShader(program, vs);
    gl.attachShader(program, fs);
    gl.linkProgram(program);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      const log = gl.getProgramInfoLog(program) ?? "";
      gl.deleteProgram(program);
      console.error(`[createProgram] ${label} link failed:\n${log}`);
      throw new Error(`Failed to link ${label} program: ${log}`);
    }
    return program;
  } finally {
    // Linked programs keep their own copy
    gl.deleteShader(vs);
    gl.deleteShader(fs);
  }
}
