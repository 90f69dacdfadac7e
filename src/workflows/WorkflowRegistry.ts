import { WorkflowRegistryError } from '../core/errors';
import type { Workflow } from '../core/workflow/Workflow';

export type WorkflowParams = Record<string, unknown>;

/**
 * Builds a fresh Workflow for one execution. Throws WorkflowValidationError for bad params.
 */
export type WorkflowFactory = (params: WorkflowParams) => Workflow;

export interface WorkflowRegistration {
  id: string;
  name: string;
  description?: string;
  factory: WorkflowFactory;
}

export class WorkflowRegistry {
  private registrations = new Map<string, WorkflowRegistration>();

  public register(registration: WorkflowRegistration): this {
    if (this.registrations.has(registration.id)) {
      throw new WorkflowRegistryError(`Workflow "${registration.id}" is already registered.`, { workflowId: registration.id });
    }
    this.registrations.set(registration.id, registration);
    return this;
  }

  public has(id: string): boolean {
    return this.registrations.has(id);
  }

  public list(): Array<Omit<WorkflowRegistration, 'factory'>> {
    return Array.from(this.registrations.values()).map(({ id, name, description }) => ({ id, name, description }));
  }

  public build(id: string, params: WorkflowParams = {}): Workflow {
    const registration = this.registrations.get(id);
    if (!registration) {
      throw new WorkflowRegistryError(`Workflow "${id}" is not registered.`, { workflowId: id });
    }
    return registration.factory(params);
  }
}
