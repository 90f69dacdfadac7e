import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  ArgumentKind,
  describeArgument,
  evalWorkDirPath,
  isStepOutput,
  literal,
  stepOutput,
  workDirPath,
} from '../../../src/core/workflow/Reference';

describe('Reference', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'stepline-ref-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should build tagged argument values', () => {
    expect(literal(42)).toEqual({ kind: ArgumentKind.LITERAL, value: 42 });
    expect(stepOutput('s1', 'x')).toEqual({ kind: ArgumentKind.STEP_OUTPUT, stepId: 's1', returnName: 'x' });
    expect(workDirPath(['a', 'b'])).toEqual({ kind: ArgumentKind.WORK_DIR_PATH, parts: ['a', 'b'], mkdir: false });
    expect(isStepOutput(stepOutput('s1', 'x'))).toBe(true);
    expect(isStepOutput(literal('s1'))).toBe(false);
  });

  it('should reject empty or absolute path segments', () => {
    expect(() => workDirPath([])).toThrow('workDirPath: at least one path segment is required.');
    expect(() => workDirPath(['a', ''])).toThrow('workDirPath: segment "" must be a non-empty relative path.');
    expect(() => workDirPath('/etc')).toThrow('workDirPath: segment "/etc" must be a non-empty relative path.');
  });

  it('should create the directory tree when mkdir is set', async () => {
    const resolved = await evalWorkDirPath(workDirPath(['a', 'b'], { mkdir: true }), root);

    expect(resolved).toBe(path.join(root, 'a', 'b'));
    expect((await stat(resolved)).isDirectory()).toBe(true);
  });

  it('should keep existing content when evaluated twice', async () => {
    const target = workDirPath(['a', 'b'], { mkdir: true });
    const first = await evalWorkDirPath(target, root);
    await writeFile(path.join(first, 'keep.txt'), 'kept', 'utf-8');

    const second = await evalWorkDirPath(target, root);

    expect(second).toBe(first);
    expect(await readFile(path.join(second, 'keep.txt'), 'utf-8')).toBe('kept');
  });

  it('should not create anything without mkdir', async () => {
    const resolved = await evalWorkDirPath(workDirPath('missing'), root);

    expect(resolved).toBe(path.join(root, 'missing'));
    await expect(stat(resolved)).rejects.toThrow();
  });

  it('should refuse paths escaping the working root', async () => {
    await expect(evalWorkDirPath(workDirPath(['..', 'outside']), root)).rejects.toThrow(
      'WorkDirPath "../outside" escapes the working root.'
    );
  });

  it('should describe each argument kind', () => {
    expect(describeArgument(literal('x'))).toBe('literal');
    expect(describeArgument(stepOutput('s1', 'x'))).toBe('step_output(s1.x)');
    expect(describeArgument(workDirPath(['a', 'b'], { mkdir: true }))).toBe('work_dir_path(a/b, mkdir)');
    expect(describeArgument(workDirPath('out'))).toBe('work_dir_path(out)');
  });
});
