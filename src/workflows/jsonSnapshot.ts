import { WorkflowValidationError } from '../core/errors';
import { literal, stepOutput, workDirPath } from '../core/workflow/Reference';
import { createStep } from '../core/workflow/Step';
import { Workflow } from '../core/workflow/Workflow';
import { fileManifest, readJsonFile, writeJsonFile } from '../operations/FileOperations';
import type { WorkflowParams, WorkflowRegistration } from './WorkflowRegistry';

export const JSON_SNAPSHOT_WORKFLOW_ID = 'json_snapshot';

/**
 * Writes the given data as JSON into the run's working directory and lists the result.
 */
export function createJsonSnapshotWorkflow(params: WorkflowParams): Workflow {
  if (!Object.hasOwn(params, 'data')) {
    throw new WorkflowValidationError(JSON_SNAPSHOT_WORKFLOW_ID, `The workflow "${JSON_SNAPSHOT_WORKFLOW_ID}" requires a "data" parameter.`);
  }
  const fileName = params.file_name ?? 'snapshot.json';
  if (typeof fileName !== 'string' || fileName.length === 0) {
    throw new WorkflowValidationError(
      JSON_SNAPSHOT_WORKFLOW_ID,
      `The workflow "${JSON_SNAPSHOT_WORKFLOW_ID}" parameter "file_name" must be a non-empty string.`
    );
  }

  const snapshotDir = workDirPath('snapshot', { mkdir: true });

  return new Workflow({
    id: JSON_SNAPSHOT_WORKFLOW_ID,
    version: '1.0',
    name: 'JSON Snapshot',
    description: 'Write data to a JSON file in the working directory and report its checksum.',
    steps: [
      createStep({
        id: 'write_snapshot',
        name: 'Write snapshot file',
        operation: writeJsonFile,
        arguments: {
          directory: snapshotDir,
          file_name: literal(fileName),
          data: literal(params.data),
        },
        returnNames: ['path'],
        outputs: ['path'],
      }),
      createStep({
        id: 'manifest',
        name: 'List snapshot files',
        operation: fileManifest,
        arguments: {
          directory: snapshotDir,
        },
        returnNames: ['files'],
        outputs: ['files'],
      }),
      createStep({
        id: 'verify',
        name: 'Read snapshot back',
        operation: readJsonFile,
        arguments: {
          path: stepOutput('write_snapshot', 'path'),
        },
        returnNames: ['data'],
      }),
    ],
  });
}

export const jsonSnapshotRegistration: WorkflowRegistration = {
  id: JSON_SNAPSHOT_WORKFLOW_ID,
  name: 'JSON Snapshot',
  description: 'Write data to a JSON file in the working directory and report its checksum.',
  factory: createJsonSnapshotWorkflow,
};
