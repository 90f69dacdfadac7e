import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { WorkflowValidationError } from '../../src/core/errors';
import { StepStage } from '../../src/core/workflow/Step';
import { WorkflowRunner } from '../../src/core/workflow/WorkflowRunner';
import { NullLogger } from '../../src/logging/NullLogger';
import { createDefaultWorkflowRegistry, createJsonSnapshotWorkflow, JSON_SNAPSHOT_WORKFLOW_ID } from '../../src/workflows';

describe('json_snapshot workflow', () => {
  let base: string;
  let runner: WorkflowRunner;

  beforeEach(async () => {
    base = await mkdtemp(path.join(os.tmpdir(), 'stepline-snapshot-'));
    runner = new WorkflowRunner({ logger: new NullLogger(), workDirBase: base, markerStream: null });
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it('should be registered in the default registry', () => {
    const registry = createDefaultWorkflowRegistry();

    expect(registry.list().map(w => w.id)).toEqual([JSON_SNAPSHOT_WORKFLOW_ID]);
  });

  it('should require data and a usable file name', () => {
    expect(() => createJsonSnapshotWorkflow({})).toThrow(WorkflowValidationError);
    expect(() => createJsonSnapshotWorkflow({})).toThrow('The workflow "json_snapshot" requires a "data" parameter.');
    expect(() => createJsonSnapshotWorkflow({ data: 1, file_name: '' })).toThrow(
      'The workflow "json_snapshot" parameter "file_name" must be a non-empty string.'
    );
  });

  it('should write, list and read back the snapshot', async () => {
    const workflow = createJsonSnapshotWorkflow({ data: { hello: 'world' } });

    const feedback = await runner.run(workflow);

    expect(feedback.workflow_id).toBe('json_snapshot');
    expect(feedback.workflow_version).toBe('1.0');
    expect(feedback.error).toBeUndefined();
    expect(feedback.steps.map(s => [s.id, s.stage])).toEqual([
      ['write_snapshot', StepStage.COMPLETED],
      ['manifest', StepStage.COMPLETED],
      ['verify', StepStage.COMPLETED],
    ]);

    const written = String(feedback.outputs.write_snapshot.path);
    expect(written.endsWith(path.join('snapshot', 'snapshot.json'))).toBe(true);

    // '{\n  "hello": "world"\n}\n' is 23 bytes.
    expect(feedback.outputs.manifest.files).toEqual([
      { name: 'snapshot.json', size: 23, md5: expect.any(String) },
    ]);
    expect(feedback.steps[2].returns).toEqual({ data: { hello: 'world' } });
    expect(feedback.outputs.verify).toEqual({});
  });

  it('should honour a custom file name', async () => {
    const feedback = await runner.run(createJsonSnapshotWorkflow({ data: [1, 2], file_name: 'numbers.json' }));

    expect(String(feedback.outputs.write_snapshot.path).endsWith('numbers.json')).toBe(true);
  });
});
