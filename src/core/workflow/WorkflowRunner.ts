// src/core/workflow/WorkflowRunner.ts

import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { StepLineConfig } from '../../config';
import type { ILogger } from '../../interfaces/ILogger';
import { ConsoleLogger } from '../../logging/ConsoleLogger';
import { StepReturnArityError, WorkflowInvariantError } from '../errors';
import { FEEDBACK_VERSION, writeFeedback } from './Feedback';
import type { Feedback, FeedbackSink, NamedReturns, StepFeedback } from './Feedback';
import { ArgumentKind, evalWorkDirPath } from './Reference';
import type { StepOutput } from './Reference';
import { StepStage } from './Step';
import type { Step } from './Step';
import type { Workflow } from './Workflow';

export type StepResult =
  | { ok: true; returns: NamedReturns }
  | { ok: false; error: unknown };

export interface WorkflowRunnerOptions {
  logger?: ILogger;
  // Directory in which each run's working root is created. Defaults to the OS temp dir.
  workDirBase?: string;
  // Delete the working root once the feedback is written. Returned paths may point into it.
  removeWorkDir?: boolean;
  // Receives `::<<<::` / `::>>>::` step markers; null disables them.
  markerStream?: NodeJS.WritableStream | null;
}

/**
 * State owned by a single run. Nothing here is shared between runs.
 */
interface RunState {
  readonly runId: string;
  readonly stages: Map<string, StepStage>;
  readonly returns: Map<string, NamedReturns>;
  workDir?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorStack(error: unknown): string[] {
  if (!(error instanceof Error) || !error.stack) {
    return [];
  }
  return error.stack
    .split('\n')
    .filter(line => /^\s+at\s/.test(line))
    .map(line => line.trim());
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return `an array of ${value.length} values`;
  if (value === null) return 'null';
  return `a value of type ${typeof value}`;
}

/**
 * Executes validated workflows step by step and reports the outcome as a feedback document.
 * Step failures never escape `run`; they end up in the feedback's `error` and `error_stack`.
 */
export class WorkflowRunner {
  private readonly logger: ILogger;
  private readonly workDirBase: string;
  private readonly removeWorkDir: boolean;
  private readonly markerStream: NodeJS.WritableStream | null;

  constructor(options: WorkflowRunnerOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger({ component: 'WorkflowRunner' });
    this.workDirBase = options.workDirBase ?? os.tmpdir();
    this.removeWorkDir = options.removeWorkDir ?? false;
    this.markerStream = options.markerStream === undefined ? process.stderr : options.markerStream;
  }

  static fromConfig(config: StepLineConfig, logger: ILogger, markerStream?: NodeJS.WritableStream | null): WorkflowRunner {
    return new WorkflowRunner({
      logger,
      workDirBase: config.workDirBase,
      removeWorkDir: config.removeWorkDir,
      markerStream,
    });
  }

  public async run(workflow: Workflow, sink?: FeedbackSink, runId: string = uuidv4()): Promise<Feedback> {
    const state: RunState = {
      runId,
      stages: new Map(workflow.steps.map(step => [step.id, StepStage.NOT_STARTED])),
      returns: new Map(),
    };
    let failure: { error: unknown } | undefined;

    this.logger.info(`Running workflow "${workflow.name}" (ID: ${workflow.id}, version: ${workflow.version})`, {
      runId: state.runId,
      steps: workflow.steps.length,
    });

    try {
      state.workDir = await mkdtemp(path.join(this.workDirBase, 'stepline-'));
      for (const step of workflow.steps) {
        const result = await this.executeStep(step, state);
        if (!result.ok) {
          failure = { error: result.error };
          break;
        }
      }
    } catch (error) {
      failure = { error };
    }

    const feedback = this.buildFeedback(workflow, state, failure);
    const completed = feedback.steps.filter(s => s.stage === StepStage.COMPLETED).length;

    if (failure) {
      this.logger.error(`Workflow "${workflow.name}" failed after ${completed}/${workflow.steps.length} steps: ${feedback.error}`, {
        runId: state.runId,
      });
    } else {
      this.logger.info(`Workflow "${workflow.name}" finished, ${completed}/${workflow.steps.length} steps completed.`, {
        runId: state.runId,
      });
    }

    try {
      await writeFeedback(feedback, sink);
    } finally {
      if (state.workDir && this.removeWorkDir) {
        await rm(state.workDir, { recursive: true, force: true });
      }
    }

    if (failure && failure.error instanceof WorkflowInvariantError) {
      throw failure.error;
    }
    return feedback;
  }

  private writeMarker(line: string): void {
    this.markerStream?.write(line);
  }

  private async executeStep(step: Step, state: RunState): Promise<StepResult> {
    const markerId = uuidv4();
    state.stages.set(step.id, StepStage.RUNNING);
    this.writeMarker(`::<<<::${markerId} ${step.name}\n`);
    this.logger.debug(`Step "${step.name}" (ID: ${step.id}) started.`, { runId: state.runId, operation: step.operation.name });

    try {
      const args = await this.resolveArguments(step, state);
      const result: unknown = await step.operation.invoke(args);
      const returns = this.destructureReturns(step, result);

      state.returns.set(step.id, returns);
      state.stages.set(step.id, StepStage.COMPLETED);
      this.logger.debug(`Step "${step.name}" (ID: ${step.id}) completed.`, { runId: state.runId });
      return { ok: true, returns };
    } catch (error) {
      this.logger.error(`Error executing step ${step.id}: ${errorMessage(error)}`, { runId: state.runId });
      return { ok: false, error };
    } finally {
      this.writeMarker(`::>>>::${markerId} ${state.stages.get(step.id)}\n`);
    }
  }

  private async resolveArguments(step: Step, state: RunState): Promise<Record<string, unknown>> {
    const resolved: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(step.arguments)) {
      switch (value.kind) {
        case ArgumentKind.LITERAL:
          resolved[name] = value.value;
          break;
        case ArgumentKind.STEP_OUTPUT:
          resolved[name] = this.lookupReturn(value, state);
          break;
        case ArgumentKind.WORK_DIR_PATH:
          if (!state.workDir) {
            throw new WorkflowInvariantError('Working root was not created before step execution.');
          }
          resolved[name] = await evalWorkDirPath(value, state.workDir);
          break;
        default: {
          const exhaustiveCheck: never = value;
          throw new WorkflowInvariantError(`Unknown argument kind for "${name}": ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    }
    return resolved;
  }

  private lookupReturn(ref: StepOutput, state: RunState): unknown {
    const returns = state.returns.get(ref.stepId);
    if (!returns || state.stages.get(ref.stepId) !== StepStage.COMPLETED) {
      throw new WorkflowInvariantError(
        `Step return value "${ref.stepId}.${ref.returnName}" was requested, but step "${ref.stepId}" has not completed.`,
        { reference: ref }
      );
    }
    if (!Object.hasOwn(returns, ref.returnName)) {
      throw new WorkflowInvariantError(
        `Step "${ref.stepId}" completed without a return value named "${ref.returnName}".`,
        { reference: ref }
      );
    }
    return returns[ref.returnName];
  }

  /**
   * One return name wraps the raw result, several require an array of exactly that many values.
   */
  private destructureReturns(step: Step, result: unknown): NamedReturns {
    const names = step.returnNames;
    if (names.length === 0) {
      return {};
    }
    if (names.length === 1) {
      return { [names[0]]: result };
    }
    if (!Array.isArray(result) || result.length !== names.length) {
      throw new StepReturnArityError(
        `Step "${step.id}" operation "${step.operation.name}" must return an array of ${names.length} values ${JSON.stringify(names)}, got ${describeValue(result)}.`,
        { stepId: step.id, expected: names.length }
      );
    }
    const items: unknown[] = result;
    return Object.fromEntries(names.map((name, i) => [name, items[i]]));
  }

  private buildFeedback(workflow: Workflow, state: RunState, failure?: { error: unknown }): Feedback {
    const feedback: Feedback = {
      feedback_version: FEEDBACK_VERSION,
      workflow_version: workflow.version,
      workflow_id: workflow.id,
      workflow_name: workflow.name,
      steps: [],
      outputs: {},
    };

    for (const step of workflow.steps) {
      const stage = state.stages.get(step.id) ?? StepStage.NOT_STARTED;
      const stepFeedback: StepFeedback = { id: step.id, name: step.name, stage, returns: {} };
      const returns = state.returns.get(step.id);

      if (stage === StepStage.COMPLETED && returns) {
        stepFeedback.returns = returns;
        feedback.outputs[step.id] = Object.fromEntries(step.outputs.map(name => [name, returns[name]]));
      }
      feedback.steps.push(stepFeedback);
    }

    if (failure) {
      feedback.error = errorMessage(failure.error);
      feedback.error_stack = errorStack(failure.error);
    }
    return feedback;
  }
}

/**
 * Runs `workflow` once with a fresh runner.
 */
export async function runWorkflow(
  workflow: Workflow,
  sink?: FeedbackSink,
  options: WorkflowRunnerOptions = {}
): Promise<Feedback> {
  return new WorkflowRunner(options).run(workflow, sink);
}
