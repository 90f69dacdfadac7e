// src/index.ts
// Public library surface of stepline.

export * from './core/errors';
export * from './core/workflow/Operation';
export * from './core/workflow/Reference';
export * from './core/workflow/Step';
export * from './core/workflow/Workflow';
export * from './core/workflow/Feedback';
export * from './core/workflow/WorkflowRunner';
export * from './interfaces';
export * from './logging';
export { loadConfig } from './config';
export type { StepLineConfig } from './config';
export * from './operations/FileOperations';
export * from './workflows';
export { createApiApp } from './api/server';
export type { ApiDependencies } from './api/server';
