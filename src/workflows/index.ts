import { jsonSnapshotRegistration } from './jsonSnapshot';
import { WorkflowRegistry } from './WorkflowRegistry';

export { WorkflowRegistry } from './WorkflowRegistry';
export type { WorkflowFactory, WorkflowParams, WorkflowRegistration } from './WorkflowRegistry';
export { createJsonSnapshotWorkflow, jsonSnapshotRegistration, JSON_SNAPSHOT_WORKFLOW_ID } from './jsonSnapshot';

export function createDefaultWorkflowRegistry(): WorkflowRegistry {
  return new WorkflowRegistry().register(jsonSnapshotRegistration);
}
