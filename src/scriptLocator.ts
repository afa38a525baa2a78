// scriptLocator.ts
// Finds `<global>.<property> = <expr>` in a script and returns the source text of <expr>.
// The text is sliced from the script as written, never regenerated from the tree.

import { parse, type AssignmentExpression, type Expression, type Pattern, type Program } from "acorn";
import { simple } from "acorn-walk";
import { BiliError } from "./errors.js";

export interface AssignmentTarget {
  global: string; // e.g. "window"
  property: string; // e.g. "__INITIAL_STATE__"
}

export interface ScriptSpan {
  start: number;
  end: number;
  text: string;
}

/**
 * Parses a script fragment, throwing PARSE_ERROR on invalid source.
 */
export function parseScript(source: string): Program {
  try {
    return parse(source, {
      ecmaVersion: "latest",
      sourceType: "script",
    });
  } catch (error) {
    throw new BiliError(
      "PARSE_ERROR",
      `Invalid script: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * Checks whether an assignment's left side is exactly `global.property`.
 * Computed access (`window["x"]`) and any other target shape never match.
 */
function isTarget(left: Pattern, target: AssignmentTarget): boolean {
  switch (left.type) {
    case "MemberExpression":
      return (
        !left.computed &&
        left.object.type === "Identifier" &&
        left.object.name === target.global &&
        left.property.type === "Identifier" &&
        left.property.name === target.property
      );
    default:
      return false;
  }
}

/**
 * Finds the right-hand side of the first matching assignment, or undefined.
 */
export function findAssignment(program: Program, target: AssignmentTarget): Expression | undefined {
  let found: Expression | undefined;

  simple(program, {
    AssignmentExpression(node: AssignmentExpression) {
      if (found || node.operator !== "=") return;
      if (isTarget(node.left, target)) {
        found = node.right;
      }
    },
  });

  return found;
}

/**
 * Locates the expression assigned to `<global>.<property>` in a script fragment.
 */
export function locateAssignment(source: string, target: AssignmentTarget): ScriptSpan {
  const program = parseScript(source);
  const right = findAssignment(program, target);

  if (!right) {
    throw new BiliError(
      "ASSIGNMENT_NOT_FOUND",
      `No assignment to ${target.global}.${target.property} found`,
    );
  }

  return {
    start: right.start,
    end: right.end,
    text: source.slice(right.start, right.end),
  };
}
