/**
 * Risk Gate — Evaluation Context
 */

export type { DiffDeps, DiffRequest, GitDiffResult, RunGitDiff } from './diff.ts';
export { getDiff, runGitDiff } from './diff.ts';
export type { PlatformContext, PlatformDeps, PlatformEnv, PlatformType } from './platform.ts';
export { detectPlatform, hasPrMetadata, platformDiffRef } from './platform.ts';
export type { TemplateOptions } from './templates.ts';
export { loadTemplates } from './templates.ts';
