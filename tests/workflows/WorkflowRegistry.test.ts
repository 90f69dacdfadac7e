import { describe, it, expect, jest } from '@jest/globals';
import { WorkflowRegistryError } from '../../src/core/errors';
import { defineOperation } from '../../src/core/workflow/Operation';
import { createStep } from '../../src/core/workflow/Step';
import { Workflow } from '../../src/core/workflow/Workflow';
import { WorkflowRegistry } from '../../src/workflows/WorkflowRegistry';
import type { WorkflowParams } from '../../src/workflows/WorkflowRegistry';

const noop = defineOperation('noop', [], () => null);

function buildNoop(params: WorkflowParams): Workflow {
  return new Workflow({
    id: 'noop',
    version: String(params.version ?? '1.0'),
    name: 'No-op',
    steps: [createStep({ id: 's1', name: 'Nothing', operation: noop })],
  });
}

describe('WorkflowRegistry', () => {
  it('should list registrations without their factories', () => {
    const registry = new WorkflowRegistry().register({ id: 'noop', name: 'No-op', factory: buildNoop });

    expect(registry.has('noop')).toBe(true);
    expect(registry.list()).toEqual([{ id: 'noop', name: 'No-op', description: undefined }]);
  });

  it('should build a new workflow from params on every call', () => {
    const factory = jest.fn(buildNoop);
    const registry = new WorkflowRegistry().register({ id: 'noop', name: 'No-op', factory });

    const first = registry.build('noop', { version: '2.0' });
    const second = registry.build('noop');

    expect(first.version).toBe('2.0');
    expect(second.version).toBe('1.0');
    expect(first).not.toBe(second);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('should reject duplicate and unknown ids', () => {
    const registry = new WorkflowRegistry().register({ id: 'noop', name: 'No-op', factory: buildNoop });

    expect(() => registry.register({ id: 'noop', name: 'Again', factory: buildNoop })).toThrow(
      'Workflow "noop" is already registered.'
    );
    expect(() => registry.build('missing')).toThrow(WorkflowRegistryError);
    expect(() => registry.build('missing')).toThrow('Workflow "missing" is not registered.');
  });
});
