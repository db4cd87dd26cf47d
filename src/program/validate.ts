/**
 * Host-side program checks.
 *
 * The interpreter accepts any program; these checks catch input that renders
 * as garbage (singular transforms, stray registers) before a frame is drawn.
 */

import { DISCARD_REGISTER, REGISTER_COUNT } from "../constants";
import { determinant } from "../math/mat3";
import type { Instruction, Uniforms } from "./types";

export type IssueSeverity = "error" | "warning";

export type IssueCode =
  | "singular-transform"
  | "unknown-opcode"
  | "unknown-combine-op"
  | "register-out-of-range"
  | "negative-radius"
  | "count-mismatch";

export interface ProgramIssue {
  /** Instruction index; -1 for issues about the program as a whole */
  index: number;
  severity: IssueSeverity;
  code: IssueCode;
  message: string;
}

function radiusIssue(index: number, what: string, radius: number): ProgramIssue | undefined {
  if (radius >= 0) return undefined;
  return {
    index,
    severity: "warning",
    code: "negative-radius",
    message: `Instruction ${index}: ${what} radius ${radius} is negative`,
  };
}

function checkInstruction(inst: Instruction, index: number): ProgramIssue[] {
  const issues: ProgramIssue[] = [];
  const { op } = inst;

  switch (op.kind) {
    case "unknown":
      issues.push({
        index,
        severity: "warning",
        code: "unknown-opcode",
        message: `Instruction ${index}: unknown opcode ${op.opcode} is ignored`,
      });
      return issues;

    case "setTransform": {
      const det = determinant(op.matrix);
      if (det === 0 || !Number.isFinite(det)) {
        issues.push({
          index,
          severity: "error",
          code: "singular-transform",
          message: `Instruction ${index}: transform is not invertible (determinant ${det})`,
        });
      }
      return issues;
    }

    case "circle": {
      const issue = radiusIssue(index, "circle", op.radius);
      if (issue) issues.push(issue);
      break;
    }

    case "rectangle":
      op.radii.forEach((r) => {
        const issue = radiusIssue(index, "corner", r);
        if (issue) issues.push(issue);
      });
      break;

    case "radialGradient": {
      const issue = radiusIssue(index, "gradient", op.radius);
      if (issue) issues.push(issue);
      return issues;
    }

    case "load":
      if (!(op.register >= 0 && op.register < REGISTER_COUNT)) {
        issues.push({
          index,
          severity: "error",
          code: "register-out-of-range",
          message: `Instruction ${index}: source register ${op.register} is outside 0..${REGISTER_COUNT - 1}`,
        });
      }
      break;

    case "none":
    case "fill":
    case "linearGradient":
    case "textureFill":
    case "setBlendMode":
      return issues;

    default:
      break;
  }

  // Remaining ops produce a scalar
  if (inst.combine === "unknown") {
    issues.push({
      index,
      severity: "warning",
      code: "unknown-combine-op",
      message: `Instruction ${index}: unknown combine op, result is not written`,
    });
  }
  if (inst.target >= REGISTER_COUNT && inst.target !== DISCARD_REGISTER && inst.combine !== "none") {
    issues.push({
      index,
      severity: "warning",
      code: "register-out-of-range",
      message: `Instruction ${index}: target register ${inst.target} is outside 0..${REGISTER_COUNT - 1}, result is discarded`,
    });
  }
  return issues;
}

/**
 * Check a program, optionally against the uniforms it will run with.
 * Returns an empty list for a clean program.
 */
export function validateProgram(
  program: readonly Instruction[],
  uniforms?: Pick<Uniforms, "instructionCount">
): ProgramIssue[] {
  const issues = program.flatMap((inst, i) => checkInstruction(inst, i));

  if (uniforms && uniforms.instructionCount !== program.length) {
    issues.push({
      index: -1,
      severity: "warning",
      code: "count-mismatch",
      message: `Instruction count ${uniforms.instructionCount} does not match program length ${program.length}`,
    });
  }
  return issues;
}
