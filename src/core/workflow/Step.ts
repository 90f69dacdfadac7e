// src/core/workflow/Step.ts

import type { Operation } from './Operation';
import { ArgumentKind } from './Reference';
import type { ArgumentValue, StepArguments } from './Reference';

/**
 * Run-time progress of a step. Numeric values are what the feedback document carries.
 * Transitions are monotonic: NOT_STARTED -> RUNNING -> COMPLETED.
 */
export enum StepStage {
  NOT_STARTED = 0,
  RUNNING = 1,
  COMPLETED = 2,
}

/**
 * A workflow node binding one operation to its argument sources.
 * Definitions are immutable; per-run stage is tracked by the runner.
 */
export interface Step {
  readonly id: string;
  readonly name: string;
  readonly operation: Operation;
  readonly arguments: StepArguments;
  // Names given to the operation's return values, in return order.
  readonly returnNames: readonly string[];
  // Return names whose values are safe to expose in the feedback outputs.
  readonly outputs: readonly string[];
}

type StepFactoryParams = {
  id: string;
  name: string;
  operation: Operation;
  arguments?: StepArguments;
  returnNames?: readonly string[];
  outputs?: readonly string[];
};

function freezeArgument(value: ArgumentValue): ArgumentValue {
  if (value.kind === ArgumentKind.WORK_DIR_PATH) {
    return Object.freeze({ ...value, parts: Object.freeze([...value.parts]) });
  }
  return Object.freeze({ ...value });
}

export function createStep(params: StepFactoryParams): Step {
  return Object.freeze({
    id: params.id,
    name: params.name,
    operation: params.operation,
    arguments: Object.freeze(Object.fromEntries(
      Object.entries(params.arguments ?? {}).map(([name, value]): [string, ArgumentValue] => [name, freezeArgument(value)])
    )),
    returnNames: Object.freeze([...(params.returnNames ?? [])]),
    outputs: Object.freeze([...(params.outputs ?? [])]),
  });
}
