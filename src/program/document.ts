/**
 * JSON program documents
 *
 * A document is `{ "version": 1, "instructions": [...] }` where each entry
 * names its operation by kind and may override the combine settings. Set
 * transform carries its six affine coefficients as `affine`.
 */

import Ajv from "ajv";
import type { ErrorObject } from "ajv";

import { DISCARD_REGISTER, FILL_STROKE } from "../constants";
import { fromAffine, toAffine } from "../math/mat3";
import { DEFAULT_SHAPE_OPTIONS } from "./ProgramBuilder";
import schema from "./program.schema.json";
import type {
  CombineOp,
  Instruction,
  Operation,
  SetTransformOp,
  UnknownOp,
} from "./types";

export type DocumentOperation =
  | Exclude<Operation, SetTransformOp | UnknownOp>
  | { kind: "setTransform"; affine: [number, number, number, number, number, number] };

export interface DocumentInstruction {
  op: DocumentOperation;
  stroke?: number;
  combine?: Exclude<CombineOp, "unknown">;
  target?: number;
  parameter?: number;
  smoothFunction?: number;
  smoothParameter?: number;
}

export interface ProgramDocument {
  version: 1;
  instructions: DocumentInstruction[];
}

export class ProgramDocumentError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}:\n  ${errors.join("\n  ")}` : message);
    this.name = "ProgramDocumentError";
    this.errors = errors;
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDocument = ajv.compile<ProgramDocument>(schema);

function describeError(error: ErrorObject): string {
  return `${error.instancePath || "/"} ${error.message ?? "is invalid"}`;
}

function producesScalar(op: DocumentOperation): boolean {
  switch (op.kind) {
    case "circle":
    case "triangle":
    case "rectangle":
    case "halfPlane":
    case "quadBezier":
    case "sdfTexture":
    case "glyph":
    case "load":
      return true;
    default:
      return false;
  }
}

function toOperation(op: DocumentOperation): Operation {
  if (op.kind === "setTransform") {
    const [a, b, c, d, e, f] = op.affine;
    return { kind: "setTransform", matrix: fromAffine(a, b, c, d, e, f) };
  }
  return op;
}

function toInstruction(entry: DocumentInstruction): Instruction {
  const scalar = producesScalar(entry.op);
  return {
    op: toOperation(entry.op),
    strokeWidth: entry.stroke ?? FILL_STROKE,
    parameter: entry.parameter ?? DEFAULT_SHAPE_OPTIONS.parameter,
    combine: entry.combine ?? (scalar ? DEFAULT_SHAPE_OPTIONS.combine : "none"),
    smoothFunction: entry.smoothFunction ?? 0,
    smoothParameter: entry.smoothParameter ?? 0,
    target: entry.target ?? (scalar ? DEFAULT_SHAPE_OPTIONS.target : DISCARD_REGISTER),
  };
}

/**
 * Validate and decode a program document.
 *
 * @param input - JSON text, or an already parsed value
 * @throws ProgramDocumentError when the text is not JSON or fails the schema
 */
export function parseProgramDocument(input: unknown): Instruction[] {
  let value: unknown = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (err) {
      throw new ProgramDocumentError(
        `Program document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  if (!validateDocument(value)) {
    const errors = (validateDocument.errors ?? []).map(describeError);
    throw new ProgramDocumentError("Program document failed validation", errors);
  }

  return value.instructions.map(toInstruction);
}

/**
 * Encode instructions as a document. Fields at their defaults are omitted.
 *
 * @throws ProgramDocumentError for operations a document cannot express
 */
export function toProgramDocument(program: readonly Instruction[]): ProgramDocument {
  const instructions = program.map((inst, index): DocumentInstruction => {
    const { op } = inst;
    let docOp: DocumentOperation;
    if (op.kind === "unknown") {
      throw new ProgramDocumentError(
        `Instruction ${index} has unknown opcode ${op.opcode}, which documents cannot express`
      );
    } else if (op.kind === "setTransform") {
      docOp = { kind: "setTransform", affine: toAffine(op.matrix) };
    } else {
      docOp = op;
    }
    if (inst.combine === "unknown") {
      throw new ProgramDocumentError(
        `Instruction ${index} has an unknown combine op, which documents cannot express`
      );
    }

    const entry: DocumentInstruction = { op: docOp };
    const scalar = producesScalar(docOp);
    if (inst.strokeWidth !== FILL_STROKE) entry.stroke = inst.strokeWidth;
    if (inst.combine !== (scalar ? DEFAULT_SHAPE_OPTIONS.combine : "none")) {
      entry.combine = inst.combine;
    }
    if (inst.target !== (scalar ? DEFAULT_SHAPE_OPTIONS.target : DISCARD_REGISTER)) {
      entry.target = inst.target;
    }
    if (inst.parameter !== 0) entry.parameter = inst.parameter;
    if (inst.smoothFunction !== 0) entry.smoothFunction = inst.smoothFunction;
    if (inst.smoothParameter !== 0) entry.smoothParameter = inst.smoothParameter;
    return entry;
  });

  return { version: 1, instructions };
}
