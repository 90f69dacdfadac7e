// src/core/workflow/Operation.ts

import { OperationRegistryError } from '../errors';

/**
 * How an operation parameter can be bound.
 * Steps bind arguments by name, so only KEYWORD parameters pass workflow validation.
 */
export enum ParameterKind {
  KEYWORD = "keyword",
  POSITIONAL_ONLY = "positional_only",
  VARIADIC = "variadic",
}

export interface ParameterSpec {
  name: string;
  kind: ParameterKind;
}

/** A bare string declares a keyword parameter. */
export type ParameterDeclaration = string | ParameterSpec;

export type OperationFunction = (args: Record<string, unknown>) => unknown;

/**
 * An external unit of work with an explicitly declared parameter list.
 * `invoke` may return a plain value or a promise.
 */
export interface Operation {
  readonly name: string;
  readonly parameters: readonly ParameterDeclaration[];
  readonly description?: string;
  invoke: OperationFunction;
}

export function normalizeParameter(declaration: ParameterDeclaration): ParameterSpec {
  return typeof declaration === 'string' ? { name: declaration, kind: ParameterKind.KEYWORD } : declaration;
}

export function getParameterNames(operation: Operation): string[] {
  return operation.parameters.map(p => normalizeParameter(p).name);
}

export function defineOperation(
  name: string,
  parameters: readonly ParameterDeclaration[],
  invoke: OperationFunction,
  description?: string
): Operation {
  return Object.freeze({
    name,
    parameters: Object.freeze([...parameters]),
    description,
    invoke,
  });
}

/**
 * Name-indexed collection of operations available to workflow factories.
 */
export class OperationRegistry {
  private operations = new Map<string, Operation>();

  constructor(operations: Operation[] = []) {
    operations.forEach(op => this.register(op));
  }

  public register(operation: Operation): this {
    if (this.operations.has(operation.name)) {
      throw new OperationRegistryError(`Operation "${operation.name}" is already registered.`, { operation: operation.name });
    }
    this.operations.set(operation.name, operation);
    return this;
  }

  public has(name: string): boolean {
    return this.operations.has(name);
  }

  public get(name: string): Operation {
    const operation = this.operations.get(name);
    if (!operation) {
      throw new OperationRegistryError(
        `Operation "${name}" is not registered, expected one of ${JSON.stringify(this.names())}.`,
        { operation: name }
      );
    }
    return operation;
  }

  public names(): string[] {
    return Array.from(this.operations.keys());
  }

  public list(): Operation[] {
    return Array.from(this.operations.values());
  }
}
