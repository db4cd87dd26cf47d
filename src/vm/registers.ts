import { REGISTER_COUNT } from "../constants";
import { mix, sigmoid, smoothstep } from "../math/scalar";
import type { CombineOp } from "../program/types";

/**
 * Merge a freshly evaluated scalar into the current register value.
 * Returns undefined when the register keeps its value.
 */
export function combine(
  op: CombineOp,
  reg: number,
  result: number,
  parameter: number
): number | undefined {
  switch (op) {
    case "replace":
      return result;
    case "replaceIfInside":
      return result < 0 ? result : undefined;
    case "replaceIfOutside":
      return result > 0 ? result : undefined;
    case "and":
      return Math.max(reg, result);
    case "or":
      return Math.min(reg, result);
    case "xor":
      return reg + result - 2 * reg * result;
    case "subtract":
      return Math.max(reg, -result);
    case "negate":
      return -result;
    case "lerp":
      return mix(reg, result, parameter);
    case "smoothstep":
      return smoothstep(reg, result, parameter);
    case "sigmoid":
      return mix(reg, result, sigmoid(parameter));
    case "none":
    case "unknown":
      return undefined;
    default: {
      const exhaustive: never = op;
      return exhaustive;
    }
  }
}

/** Fixed-size per-pixel scalar stack */
export class RegisterStack {
  private readonly values = new Float64Array(REGISTER_COUNT);

  get length(): number {
    return REGISTER_COUNT;
  }

  /** Out-of-range and non-integer reads return 0 */
  get(index: number): number {
    return RegisterStack.holds(index) ? this.values[index] : 0;
  }

  /** Writes to an index outside the stack are dropped */
  set(index: number, value: number): void {
    if (RegisterStack.holds(index)) {
      this.values[index] = value;
    }
  }

  /** Combine `result` into register `target`; targets past the stack are skipped */
  apply(target: number, op: CombineOp, result: number, parameter: number): void {
    if (target >= REGISTER_COUNT) return;
    const next = combine(op, this.get(target), result, parameter);
    if (next !== undefined) {
      this.set(target, next);
    }
  }

  private static holds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < REGISTER_COUNT;
  }

  reset(): void {
    this.values.fill(0);
  }

  toArray(): number[] {
    return Array.from(this.values);
  }
}
