/**
 * Interpreter shaders
 *
 * The fragment shader runs the same register machine as src/vm for every
 * pixel. Instructions come from an RGBA32F texture, one row per instruction:
 *   texel 0: opcode, stroke width, parameter, smooth function
 *   texel 1-4: operands 0-15
 *   texel 5: combine op, smooth parameter, target register, unused
 * Ids and constants are spliced in from the TypeScript definitions.
 */

import {
  EDGE_WIDTH,
  GRADIENT_EPSILON,
  MSDF_EDGE,
  OUTPUT_GAMMA,
  REGISTER_COUNT,
  SHAPE_REGISTER,
  TEXTURE_SDF_RANGE,
} from "../constants";
import { BLEND_MODES, COMBINE_OPS, Opcode, type BlendMode, type CombineOp } from "../program/types";

/** Texels per instruction row */
export const TEXELS_PER_INSTRUCTION = 6;

/** GLSL float literal */
export function glslFloat(n: number): string {
  return Number.isInteger(n) ? `${n}.0` : `${n}`;
}

const combineId = (op: Exclude<CombineOp, "unknown">): number => COMBINE_OPS.indexOf(op);
const blendId = (mode: BlendMode): number => BLEND_MODES.indexOf(mode);

export const interpreterVertexShader = `#version 300 es
const vec2 CORNERS[6] = vec2[6](
  vec2(-1.0, -1.0), vec2(1.0, -1.0), vec2(-1.0, 1.0),
  vec2(-1.0, 1.0), vec2(1.0, -1.0), vec2(1.0, 1.0)
);

void main() {
  gl_Position = vec4(CORNERS[gl_VertexID], 0.0, 1.0);
}
`;

export const interpreterFragmentShader = `#version 300 es
precision highp float;
precision highp int;
precision highp sampler2D;
precision mediump sampler2DArray;

#define REGISTER_COUNT ${REGISTER_COUNT}
#define SHAPE_REGISTER ${SHAPE_REGISTER}
#define GRADIENT_EPSILON ${glslFloat(GRADIENT_EPSILON)}
#define EDGE_WIDTH ${glslFloat(EDGE_WIDTH)}
#define OUTPUT_GAMMA ${glslFloat(OUTPUT_GAMMA)}
#define TEXTURE_SDF_RANGE ${glslFloat(TEXTURE_SDF_RANGE)}
#define MSDF_EDGE ${glslFloat(MSDF_EDGE)}

#define OP_CIRCLE ${Opcode.Circle}
#define OP_TRIANGLE ${Opcode.Triangle}
#define OP_RECTANGLE ${Opcode.Rectangle}
#define OP_HALF_PLANE ${Opcode.HalfPlane}
#define OP_QUAD_BEZIER ${Opcode.QuadBezier}
#define OP_SDF_TEXTURE ${Opcode.SdfTexture}
#define OP_GLYPH ${Opcode.Glyph}
#define OP_FILL ${Opcode.Fill}
#define OP_LINEAR_GRADIENT ${Opcode.LinearGradient}
#define OP_RADIAL_GRADIENT ${Opcode.RadialGradient}
#define OP_TEXTURE_FILL ${Opcode.TextureFill}
#define OP_SET_TRANSFORM ${Opcode.SetTransform}
#define OP_SET_BLEND_MODE ${Opcode.SetBlendMode}
#define OP_LOAD ${Opcode.Load}

#define C_REPLACE ${combineId("replace")}
#define C_REPLACE_IF_INSIDE ${combineId("replaceIfInside")}
#define C_REPLACE_IF_OUTSIDE ${combineId("replaceIfOutside")}
#define C_AND ${combineId("and")}
#define C_OR ${combineId("or")}
#define C_XOR ${combineId("xor")}
#define C_SUBTRACT ${combineId("subtract")}
#define C_NEGATE ${combineId("negate")}
#define C_LERP ${combineId("lerp")}
#define C_SMOOTHSTEP ${combineId("smoothstep")}
#define C_SIGMOID ${combineId("sigmoid")}

#define BLEND_REPLACE ${blendId("replace")}
#define BLEND_ADD ${blendId("add")}
#define BLEND_MULTIPLY ${blendId("multiply")}
#define BLEND_SUBTRACT ${blendId("subtract")}
#define BLEND_DIVIDE ${blendId("divide")}
#define BLEND_MIN ${blendId("min")}
#define BLEND_MAX ${blendId("max")}
#define BLEND_ALPHA_UNDER ${blendId("alphaUnder")}

uniform sampler2D u_program;
uniform sampler2DArray u_atlas;
uniform sampler2DArray u_glyphs;
uniform vec2 u_windowSize;
uniform vec2 u_pointer;
uniform float u_time;
uniform float u_scaleFactor;
uniform int u_instructionCount;
uniform float u_glyphCellsPerRow;
uniform bool u_hasAtlas;
uniform bool u_hasGlyphs;

out vec4 fragColor;

float registers[REGISTER_COUNT];

float cross2(vec2 a, vec2 b) {
  return a.x * b.y - a.y * b.x;
}

float cbrt(float x) {
  return sign(x) * pow(abs(x), 1.0 / 3.0);
}

// smoothstep without the edge0 < edge1 requirement
float smoothstepAny(float e0, float e1, float x) {
  float t = clamp((x - e0) / (e1 - e0), 0.0, 1.0);
  return t * t * (3.0 - 2.0 * t);
}

float median3(float a, float b, float c) {
  return max(min(a, b), min(max(a, b), c));
}

float sdCircle(vec2 p, vec2 c, float r) {
  return length(p - c) - r;
}

float sdSegment(vec2 p, vec2 a, vec2 b) {
  vec2 pa = p - a;
  vec2 ba = b - a;
  float h = clamp(dot(pa, ba) / dot(ba, ba), 0.0, 1.0);
  return length(pa - ba * h);
}

float sdTriangle(vec2 p, vec2 a, vec2 b, vec2 c) {
  float d = min(min(sdSegment(p, a, b), sdSegment(p, b, c)), sdSegment(p, c, a));
  float w = sign(cross2(b - a, p - a)) + sign(cross2(c - b, p - b)) + sign(cross2(a - c, p - c));
  return abs(w) > 2.0 ? -d : d;
}

float sdRoundedRect(vec2 p, vec2 lo, vec2 hi, vec4 radii) {
  vec2 h = abs(hi - lo) * 0.5;
  vec2 q = p - (lo + hi) * 0.5;
  float r = q.x < 0.0 ? (q.y < 0.0 ? radii.x : radii.w) : (q.y < 0.0 ? radii.y : radii.z);
  r = clamp(r, 0.0, min(h.x, h.y));
  vec2 d = abs(q) - h + r;
  return min(max(d.x, d.y), 0.0) + length(max(d, 0.0)) - r;
}

float sdHalfPlane(vec2 p, vec2 a, vec2 b) {
  vec2 dir = b - a;
  return cross2(p - a, dir) / length(dir);
}

float signedAt(float t, vec2 b, vec2 c, vec2 d) {
  vec2 q = d + (c + b * t) * t;
  vec2 tangent = c + 2.0 * b * t;
  float dist = length(q);
  return cross2(tangent, q) < 0.0 ? -dist : dist;
}

float sdQuadBezier(vec2 p, vec2 p0, vec2 p1, vec2 p2) {
  vec2 a = p1 - p0;
  vec2 b = p0 - 2.0 * p1 + p2;
  vec2 c = a * 2.0;
  vec2 d = p0 - p;
  float bb = dot(b, b);
  if (bb < 1e-12) {
    float s = sign(sdHalfPlane(p, p0, p2));
    return (s == 0.0 ? 1.0 : s) * sdSegment(p, p0, p2);
  }
  float kk = 1.0 / bb;
  float kx = kk * dot(a, b);
  float ky = kk * (2.0 * dot(a, a) + dot(d, b)) / 3.0;
  float kz = kk * dot(d, a);
  float pp = ky - kx * kx;
  float q = kx * (2.0 * kx * kx - 3.0 * ky) + kz;
  float h = q * q + 4.0 * pp * pp * pp;
  if (h >= 0.0) {
    float sh = sqrt(h);
    float t = clamp(cbrt((sh - q) * 0.5) + cbrt((-sh - q) * 0.5) - kx, 0.0, 1.0);
    return signedAt(t, b, c, d);
  }
  float z = sqrt(-pp);
  float phi = acos(q / (pp * z * 2.0)) / 3.0;
  float m = cos(phi);
  float n = sin(phi) * sqrt(3.0);
  float s0 = signedAt(clamp((m + m) * z - kx, 0.0, 1.0), b, c, d);
  float s1 = signedAt(clamp((-n - m) * z - kx, 0.0, 1.0), b, c, d);
  return abs(s0) < abs(s1) ? s0 : s1;
}

float sdTexture(vec2 p, vec2 lo, vec2 hi, float layer) {
  float lum = 0.0;
  if (u_hasAtlas) {
    vec3 rgb = texture(u_atlas, vec3((p - lo) / (hi - lo), layer)).rgb;
    lum = dot(rgb, vec3(0.2126, 0.7152, 0.0722));
  }
  return (0.5 - lum) * u_scaleFactor * TEXTURE_SDF_RANGE;
}

float sdGlyph(vec2 p, vec2 position, float fontSize, float glyphId) {
  vec2 uv = (p - position) / fontSize;
  if (!u_hasGlyphs || any(lessThan(uv, vec2(0.0))) || any(greaterThan(uv, vec2(1.0)))) {
    return 1.0;
  }
  float perPage = u_glyphCellsPerRow * u_glyphCellsPerRow;
  float page = floor(glyphId / perPage);
  float index = glyphId - page * perPage;
  vec2 cell = vec2(mod(index, u_glyphCellsPerRow), floor(index / u_glyphCellsPerRow));
  vec3 s = texture(u_glyphs, vec3((cell + uv) / u_glyphCellsPerRow, page)).rgb;
  return 1.0 - 2.0 * smoothstep(0.5 - MSDF_EDGE, 0.5 + MSDF_EDGE, median3(s.r, s.g, s.b));
}

float shapeDistance(int opcode, vec4 o0, vec4 o1, vec2 p) {
  if (opcode == OP_CIRCLE) return sdCircle(p, o0.xy, o0.z);
  if (opcode == OP_TRIANGLE) return sdTriangle(p, o0.xy, o0.zw, o1.xy);
  if (opcode == OP_RECTANGLE) return sdRoundedRect(p, o0.xy, o0.zw, o1);
  if (opcode == OP_HALF_PLANE) return sdHalfPlane(p, o0.xy, o0.zw);
  if (opcode == OP_QUAD_BEZIER) return sdQuadBezier(p, o0.xy, o0.zw, o1.xy);
  if (opcode == OP_SDF_TEXTURE) return sdTexture(p, o0.xy, o0.zw, o1.x);
  return sdGlyph(p, o0.xy, o0.z, o0.w);
}

vec4 paintColor(int opcode, vec4 o0, vec4 o1, vec4 o2, vec2 p) {
  if (opcode == OP_FILL) return o0;
  if (opcode == OP_LINEAR_GRADIENT) {
    vec2 axis = o2.zw - o2.xy;
    float t = clamp(abs(dot(p - o2.xy, axis) / dot(axis, axis)), 0.0, 1.0);
    return mix(o0, o1, t);
  }
  if (opcode == OP_RADIAL_GRADIENT) {
    float t = clamp(length(p - o2.xy) / o2.z, 0.0, 1.0);
    return mix(o0, o1, t);
  }
  if (!u_hasAtlas) return vec4(0.0);
  vec2 s = (p - o0.xy) / (o0.zw - o0.xy);
  return texture(u_atlas, vec3(mix(o1.xy, o1.zw, s), o2.x));
}

vec4 blend(int mode, vec4 dst, vec4 src) {
  if (mode == BLEND_ADD) return dst + src;
  if (mode == BLEND_MULTIPLY) return dst * src;
  if (mode == BLEND_SUBTRACT) return dst - src;
  if (mode == BLEND_DIVIDE) return src / dst;
  if (mode == BLEND_MIN) return min(dst, src);
  if (mode == BLEND_MAX) return max(dst, src);
  if (mode == BLEND_ALPHA_UNDER) {
    float dw = dst.a * (1.0 - src.a);
    float a = src.a + dw;
    if (a == 0.0) return vec4(0.0);
    return vec4((src.rgb * src.a + dst.rgb * dw) / a, a);
  }
  return src;
}

void combine(int op, int target, float result, float parameter) {
  float reg = registers[target];
  if (op == C_REPLACE) registers[target] = result;
  else if (op == C_REPLACE_IF_INSIDE) { if (result < 0.0) registers[target] = result; }
  else if (op == C_REPLACE_IF_OUTSIDE) { if (result > 0.0) registers[target] = result; }
  else if (op == C_AND) registers[target] = max(reg, result);
  else if (op == C_OR) registers[target] = min(reg, result);
  else if (op == C_XOR) registers[target] = reg + result - 2.0 * reg * result;
  else if (op == C_SUBTRACT) registers[target] = max(reg, -result);
  else if (op == C_NEGATE) registers[target] = -result;
  else if (op == C_LERP) registers[target] = mix(reg, result, parameter);
  else if (op == C_SMOOTHSTEP) registers[target] = smoothstepAny(reg, result, parameter);
  else if (op == C_SIGMOID) registers[target] = mix(reg, result, 1.0 / (1.0 + exp(-parameter)));
}

int idOf(float value) {
  return value >= 0.0 && value < 256.0 ? int(value) : -1;
}

vec2 toLocal(mat3 inv, vec2 screen) {
  return (inv * vec3(screen, 1.0)).xy;
}

void main() {
  vec2 pixel = vec2(gl_FragCoord.x, u_windowSize.y - gl_FragCoord.y);
  for (int r = 0; r < REGISTER_COUNT; r++) registers[r] = 0.0;

  mat3 inv = mat3(1.0);
  int blendMode = BLEND_ALPHA_UNDER;
  vec4 color = vec4(0.0);
  vec2 ex = vec2(GRADIENT_EPSILON, 0.0);
  vec2 ey = vec2(0.0, GRADIENT_EPSILON);

  for (int i = 0; i < u_instructionCount; i++) {
    vec4 head = texelFetch(u_program, ivec2(0, i), 0);
    vec4 o0 = texelFetch(u_program, ivec2(1, i), 0);
    vec4 o1 = texelFetch(u_program, ivec2(2, i), 0);
    vec4 o2 = texelFetch(u_program, ivec2(3, i), 0);
    vec4 tail = texelFetch(u_program, ivec2(5, i), 0);
    int opcode = idOf(head.x);

    if (opcode == OP_SET_TRANSFORM) {
      inv = inverse(mat3(o0.x, o0.w, 0.0, o0.y, o1.x, 0.0, o0.z, o1.y, 1.0));
      continue;
    }
    if (opcode == OP_SET_BLEND_MODE) {
      int mode = idOf(o0.x);
      blendMode = mode < 0 ? BLEND_REPLACE : mode;
      continue;
    }

    vec2 p = toLocal(inv, pixel);

    if (opcode >= OP_FILL && opcode <= OP_TEXTURE_FILL) {
      float d = registers[SHAPE_REGISTER];
      if (d < 0.0) {
        vec4 src = paintColor(opcode, o0, o1, o2, p);
        src.a *= clamp(-d / EDGE_WIDTH, 0.0, 1.0);
        color = blend(blendMode, color, src);
      }
      continue;
    }

    float result;
    float m = 0.0;
    if (opcode >= OP_CIRCLE && opcode <= OP_GLYPH) {
      result = shapeDistance(opcode, o0, o1, p);
      vec2 g = vec2(
        shapeDistance(opcode, o0, o1, toLocal(inv, pixel + ex)) -
          shapeDistance(opcode, o0, o1, toLocal(inv, pixel - ex)),
        shapeDistance(opcode, o0, o1, toLocal(inv, pixel + ey)) -
          shapeDistance(opcode, o0, o1, toLocal(inv, pixel - ey))
      ) / (2.0 * GRADIENT_EPSILON);
      m = length(g);
    } else if (opcode == OP_LOAD) {
      int source = idOf(o0.x);
      result = source >= 0 && source < REGISTER_COUNT ? registers[source] : 0.0;
    } else {
      continue;
    }

    if (head.y >= 0.0) result = abs(result) - head.y * 0.5;
    if (m != 0.0) result /= m;
    if (tail.z >= float(REGISTER_COUNT)) continue;
    combine(idOf(tail.x), int(tail.z), result, head.z);
  }

  fragColor = vec4(pow(color.rgb, vec3(OUTPUT_GAMMA)), color.a);
}
`;
