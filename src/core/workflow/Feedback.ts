// src/core/workflow/Feedback.ts

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { StepStage } from './Step';

export const FEEDBACK_VERSION = "2.0";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type NamedReturns = Record<string, unknown>;

export interface StepFeedback {
  id: string;
  name: string;
  stage: StepStage;
  // Empty unless stage is COMPLETED.
  returns: NamedReturns;
}

/**
 * Structured record of one workflow execution.
 * The keys are snake_case because the document is consumed outside this process.
 */
export interface Feedback {
  feedback_version: typeof FEEDBACK_VERSION;
  workflow_version: string;
  workflow_id: string;
  workflow_name: string;
  steps: StepFeedback[];
  outputs: Record<string, NamedReturns>;
  error?: string;
  error_stack?: string[];
}

/**
 * Where the runner delivers the feedback document: nothing, a file path or a writable stream.
 */
export type FeedbackSink = string | NodeJS.WritableStream | null | undefined;

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object' || typeof value === 'function') {
    const ctor: unknown = Reflect.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name) {
      return ctor.name;
    }
    return typeof value === 'function' ? 'Function' : 'Object';
  }
  return typeof value;
}

export function nonSerializablePlaceholder(value: unknown): string {
  let repr: string;
  try {
    repr = String(value);
  } catch {
    repr = '<non-representable>';
  }
  return `<non-serializable: ${typeName(value)} ${repr}>`;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Reflect.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function hasToJSON(value: object): value is { toJSON(key?: string): unknown } {
  return typeof Reflect.get(value, 'toJSON') === 'function';
}

/**
 * Converts any value into JSON data with sorted object keys.
 * Values JSON cannot represent become a "<non-serializable: Type repr>" string instead of failing.
 */
export function toJsonSafe(value: unknown, seen: WeakSet<object> = new WeakSet()): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'object') {
    // undefined is handled by the container; bigint, symbol and function land here.
    return value === undefined ? null : nonSerializablePlaceholder(value);
  }
  if (seen.has(value)) {
    return nonSerializablePlaceholder(value);
  }

  if (Array.isArray(value)) {
    seen.add(value);
    const items = value.map(item => toJsonSafe(item, seen));
    seen.delete(value);
    return items;
  }

  if (hasToJSON(value)) {
    let converted: unknown;
    try {
      converted = value.toJSON();
    } catch {
      return nonSerializablePlaceholder(value);
    }
    seen.add(value);
    const result = toJsonSafe(converted, seen);
    seen.delete(value);
    return result;
  }

  if (!isPlainObject(value)) {
    return nonSerializablePlaceholder(value);
  }

  seen.add(value);
  // fromEntries defines own properties, so a "__proto__" key survives.
  const entries: Array<[string, JsonValue]> = [];
  for (const key of Object.keys(value).sort()) {
    const member = value[key];
    if (member === undefined) continue;
    entries.push([key, toJsonSafe(member, seen)]);
  }
  seen.delete(value);
  return Object.fromEntries(entries);
}

export function serializeFeedback(feedback: Feedback): string {
  return JSON.stringify(toJsonSafe(feedback), null, 2);
}

function isStandardStream(stream: NodeJS.WritableStream): boolean {
  return stream === process.stdout || stream === process.stderr;
}

function writeToStream(stream: NodeJS.WritableStream, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(text, (err?: Error | null) => (err ? reject(err) : resolve()));
  });
}

/**
 * Writes the feedback document once to the given sink.
 */
export async function writeFeedback(feedback: Feedback, sink: FeedbackSink): Promise<void> {
  if (sink === undefined || sink === null) {
    return;
  }

  const text = serializeFeedback(feedback);

  if (typeof sink === 'string') {
    await mkdir(path.dirname(sink), { recursive: true });
    await writeFile(sink, text + '\n', 'utf-8');
    return;
  }

  if (isStandardStream(sink)) {
    await writeToStream(sink, 'Feedback:\n');
  }
  await writeToStream(sink, text + '\n');
}
