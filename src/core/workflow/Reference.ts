// src/core/workflow/Reference.ts

import { mkdir } from 'fs/promises';
import path from 'path';

/**
 * The three kinds of value a step argument can be bound to.
 * Using a string enum keeps the kind readable in serialized workflow descriptions.
 */
export enum ArgumentKind {
  LITERAL = "literal",
  STEP_OUTPUT = "step_output",
  WORK_DIR_PATH = "work_dir_path",
}

/**
 * A value passed to the operation unchanged.
 */
export interface LiteralArgument<T = unknown> {
  readonly kind: ArgumentKind.LITERAL;
  readonly value: T;
}

/**
 * Points at a named return value of an earlier step in the same workflow.
 * Resolved by the runner at execution time.
 */
export interface StepOutput {
  readonly kind: ArgumentKind.STEP_OUTPUT;
  readonly stepId: string;
  readonly returnName: string;
}

/**
 * A path relative to the per-run working root.
 * Evaluated lazily, once per step invocation.
 */
export interface WorkDirPath {
  readonly kind: ArgumentKind.WORK_DIR_PATH;
  readonly parts: readonly string[];
  readonly mkdir: boolean;
}

export type ArgumentValue = LiteralArgument | StepOutput | WorkDirPath;

export type StepArguments = Readonly<Record<string, ArgumentValue>>;

export function literal<T>(value: T): LiteralArgument<T> {
  return { kind: ArgumentKind.LITERAL, value };
}

export function stepOutput(stepId: string, returnName: string): StepOutput {
  return { kind: ArgumentKind.STEP_OUTPUT, stepId, returnName };
}

export function workDirPath(parts: string | readonly string[], options: { mkdir?: boolean } = {}): WorkDirPath {
  const list = typeof parts === 'string' ? [parts] : [...parts];
  if (list.length === 0) {
    throw new Error('workDirPath: at least one path segment is required.');
  }
  for (const part of list) {
    if (part.length === 0 || path.isAbsolute(part)) {
      throw new Error(`workDirPath: segment "${part}" must be a non-empty relative path.`);
    }
  }
  return { kind: ArgumentKind.WORK_DIR_PATH, parts: Object.freeze(list), mkdir: options.mkdir ?? false };
}

export function isStepOutput(value: ArgumentValue): value is StepOutput {
  return value.kind === ArgumentKind.STEP_OUTPUT;
}

/**
 * Resolves a WorkDirPath against `root`, creating the directory tree when `mkdir` is set.
 * Existing content is never touched, so evaluating the same path twice is safe.
 */
export async function evalWorkDirPath(target: WorkDirPath, root: string): Promise<string> {
  const resolved = path.join(root, ...target.parts);
  const relative = path.relative(root, resolved);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`WorkDirPath "${target.parts.join('/')}" escapes the working root.`);
  }
  if (target.mkdir) {
    await mkdir(resolved, { recursive: true });
  }
  return resolved;
}

/**
 * Short human-readable form used in workflow descriptions and log lines.
 */
export function describeArgument(value: ArgumentValue): string {
  switch (value.kind) {
    case ArgumentKind.LITERAL:
      return 'literal';
    case ArgumentKind.STEP_OUTPUT:
      return `step_output(${value.stepId}.${value.returnName})`;
    case ArgumentKind.WORK_DIR_PATH:
      return `work_dir_path(${value.parts.join('/')}${value.mkdir ? ', mkdir' : ''})`;
    default: {
      const exhaustiveCheck: never = value;
      throw new Error(`Unknown argument kind: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}
