// src/core/workflow/Workflow.ts

import { WorkflowValidationError } from '../errors';
import { ParameterKind, getParameterNames, normalizeParameter } from './Operation';
import { describeArgument, isStepOutput } from './Reference';
import { createStep } from './Step';
import type { Step } from './Step';

export interface WorkflowDefinition {
  id: string; // e.g. "project_export"
  version: string;
  name: string;
  description?: string;
  steps: readonly Step[];
}

/**
 * Serializable description of a workflow definition, used by listings.
 */
export interface WorkflowDescription {
  id: string;
  version: string;
  name: string;
  description: string;
  steps: Array<{
    id: string;
    name: string;
    operation: string;
    parameters: string[];
    arguments: Record<string, string>;
    returnNames: string[];
    outputs: string[];
  }>;
}

/**
 * An ordered, validated sequence of steps.
 * Step order defines both execution order and which earlier returns a step may reference.
 * The constructor throws WorkflowValidationError for an invalid definition, so an
 * instance that exists is always safe to hand to the runner.
 */
export class Workflow {
  readonly id: string;
  readonly version: string;
  readonly name: string;
  readonly description: string;
  readonly steps: readonly Step[];

  constructor(definition: WorkflowDefinition) {
    this.id = definition.id;
    this.version = definition.version;
    this.name = definition.name;
    this.description = definition.description ?? '';
    // Copied so later changes to the caller's step objects cannot bypass validation.
    this.steps = Object.freeze(definition.steps.map(step => createStep(step)));

    this.validate();
  }

  public getStep(stepId: string): Step | undefined {
    return this.steps.find(step => step.id === stepId);
  }

  private invalid(message: string, details: Record<string, unknown> = {}): WorkflowValidationError {
    return new WorkflowValidationError(this.id, `The workflow "${this.id}" ${message}`, details);
  }

  private validate(): void {
    if (this.steps.length === 0) {
      throw this.invalid('should contain at least one step.');
    }

    // Return names of the steps validated so far, keyed by step id.
    const previousReturns = new Map<string, readonly string[]>();

    for (const step of this.steps) {
      const operationName = step.operation.name;

      if (previousReturns.has(step.id)) {
        throw this.invalid(`has more than one step with id "${step.id}".`, { stepId: step.id });
      }

      const paramNames: string[] = [];
      for (const declaration of step.operation.parameters) {
        const param = normalizeParameter(declaration);
        if (param.kind !== ParameterKind.KEYWORD) {
          throw this.invalid(`method "${operationName}" has a non keyword parameter "${param.name}".`, {
            stepId: step.id,
            parameter: param.name,
          });
        }
        if (paramNames.includes(param.name)) {
          throw this.invalid(`method "${operationName}" declares parameter "${param.name}" more than once.`, {
            stepId: step.id,
            parameter: param.name,
          });
        }
        if (!Object.hasOwn(step.arguments, param.name)) {
          throw this.invalid(
            `method "${operationName}" has an argument "${param.name}" that is not available in the step "${step.id}" definition "arguments", expected one of ${JSON.stringify(Object.keys(step.arguments))}.`,
            { stepId: step.id, parameter: param.name }
          );
        }
        paramNames.push(param.name);
      }

      for (const [name, value] of Object.entries(step.arguments)) {
        if (isStepOutput(value)) {
          const returns = previousReturns.get(value.stepId);
          if (!returns) {
            throw this.invalid(
              `has step "${step.id}" that requires a non-existing step return value "${value.stepId}.${value.returnName}" for argument "${name}". Previous step with that id does not exist.`,
              { stepId: step.id, parameter: name, reference: value }
            );
          }
          if (!returns.includes(value.returnName)) {
            throw this.invalid(
              `has step "${step.id}" that requires a non-existing step return value "${value.stepId}.${value.returnName}" for argument "${name}". Previous step with that id found, but returns no value with such name.`,
              { stepId: step.id, parameter: name, reference: value }
            );
          }
        }

        if (!paramNames.includes(name)) {
          throw this.invalid(
            `method "${operationName}" receives a parameter "${name}" in step "${step.id}" that is not available in the method definition, expected one of ${JSON.stringify(paramNames)}.`,
            { stepId: step.id, parameter: name }
          );
        }
      }

      const seenReturns = new Set<string>();
      for (const returnName of step.returnNames) {
        if (seenReturns.has(returnName)) {
          throw this.invalid(`has step "${step.id}" that declares return name "${returnName}" more than once.`, {
            stepId: step.id,
            returnName,
          });
        }
        seenReturns.add(returnName);
      }

      for (const outputName of step.outputs) {
        if (!seenReturns.has(outputName)) {
          throw this.invalid(
            `has step "${step.id}" with output "${outputName}" that is not one of its return names ${JSON.stringify(step.returnNames)}.`,
            { stepId: step.id, output: outputName }
          );
        }
      }

      previousReturns.set(step.id, step.returnNames);
    }
  }

  public toJSON(): WorkflowDescription {
    return {
      id: this.id,
      version: this.version,
      name: this.name,
      description: this.description,
      steps: this.steps.map(step => ({
        id: step.id,
        name: step.name,
        operation: step.operation.name,
        parameters: getParameterNames(step.operation),
        arguments: Object.fromEntries(
          Object.entries(step.arguments).map(([name, value]) => [name, describeArgument(value)])
        ),
        returnNames: [...step.returnNames],
        outputs: [...step.outputs],
      })),
    };
  }
}
