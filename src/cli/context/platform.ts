/**
 * Risk Gate — CI Platform Detection
 *
 * Recognizes GitHub Actions and Azure DevOps from their environment and
 * lifts pull request metadata out of it. Anything else is `local`.
 *
 * Azure DevOps exposes no PR title or description in its variables; those
 * stay unset unless passed on the command line.
 */

import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import {
  ignoreWarnings,
  WARNING_PLATFORM_EVENT_UNREADABLE,
  type WarningSink,
} from '../../engine/warnings.ts';
import { formatErrorMessage } from '../../errors/errors.ts';

export type PlatformType = 'github' | 'azuredevops' | 'local';

export interface PlatformContext {
  readonly platform: PlatformType;
  readonly prNumber?: string;
  readonly prTitle?: string;
  readonly prDescription?: string;
  readonly baseBranch?: string;
  readonly sourceBranch?: string;
  readonly repository?: string;
}

export type PlatformEnv = Readonly<Record<string, string | undefined>>;

export interface PlatformDeps {
  readonly readFile?: (path: string) => Promise<string>;
  readonly onWarning?: WarningSink;
}

const PR_EVENTS: ReadonlySet<string> = new Set(['pull_request', 'pull_request_target']);

const GitHubEventSchema = z.object({
  pull_request: z
    .object({
      number: z.number().int().optional(),
      title: z.string().nullish(),
      body: z.string().nullish(),
    })
    .optional(),
});

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function present(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function definedOnly(context: {
  platform: PlatformType;
  prNumber?: string | undefined;
  prTitle?: string | undefined;
  prDescription?: string | undefined;
  baseBranch?: string | undefined;
  sourceBranch?: string | undefined;
  repository?: string | undefined;
}): PlatformContext {
  return {
    platform: context.platform,
    ...(context.prNumber === undefined ? {} : { prNumber: context.prNumber }),
    ...(context.prTitle === undefined ? {} : { prTitle: context.prTitle }),
    ...(context.prDescription === undefined ? {} : { prDescription: context.prDescription }),
    ...(context.baseBranch === undefined ? {} : { baseBranch: context.baseBranch }),
    ...(context.sourceBranch === undefined ? {} : { sourceBranch: context.sourceBranch }),
    ...(context.repository === undefined ? {} : { repository: context.repository }),
  };
}

/**
 * Git ref to diff against: `origin/<base>` when a base branch is known.
 */
export function platformDiffRef(context: PlatformContext): string | undefined {
  if (context.baseBranch === undefined) {
    return undefined;
  }
  return `origin/${context.baseBranch.replace(/^refs\/heads\//, '')}`;
}

/** True when a PR number and a title or description are known. */
export function hasPrMetadata(context: PlatformContext): boolean {
  return (
    context.prNumber !== undefined &&
    (context.prTitle !== undefined || context.prDescription !== undefined)
  );
}

/* -------------------------------------------------------------------------- */
/* Detection                                                                  */
/* -------------------------------------------------------------------------- */

async function readGitHubEvent(
  path: string,
  read: (path: string) => Promise<string>,
  onWarning: WarningSink,
): Promise<{ prNumber?: string; prTitle?: string; prDescription?: string }> {
  try {
    const event = GitHubEventSchema.parse(JSON.parse(await read(path)));
    const pr = event.pull_request;
    return {
      ...(pr?.number === undefined ? {} : { prNumber: String(pr.number) }),
      ...(typeof pr?.title === 'string' ? { prTitle: pr.title } : {}),
      ...(typeof pr?.body === 'string' ? { prDescription: pr.body } : {}),
    };
  } catch (error) {
    onWarning({
      code: WARNING_PLATFORM_EVENT_UNREADABLE,
      stage: 'context',
      message: `Could not read GitHub event file: ${formatErrorMessage(error)}`,
    });
    return {};
  }
}

async function detectGitHub(env: PlatformEnv, deps: PlatformDeps): Promise<PlatformContext> {
  const eventName = env.GITHUB_EVENT_NAME;
  const eventPath = present(env.GITHUB_EVENT_PATH);
  const pr =
    eventName !== undefined && PR_EVENTS.has(eventName) && eventPath !== undefined
      ? await readGitHubEvent(
          eventPath,
          deps.readFile ?? ((path) => readFile(path, 'utf8')),
          deps.onWarning ?? ignoreWarnings,
        )
      : {};

  return definedOnly({
    platform: 'github',
    ...pr,
    baseBranch: present(env.GITHUB_BASE_REF),
    sourceBranch: present(env.GITHUB_HEAD_REF),
    repository: present(env.GITHUB_REPOSITORY),
  });
}

function detectAzureDevOps(env: PlatformEnv): PlatformContext {
  return definedOnly({
    platform: 'azuredevops',
    prNumber: present(env.SYSTEM_PULLREQUEST_PULLREQUESTID),
    baseBranch: present(env.SYSTEM_PULLREQUEST_TARGETBRANCH),
    sourceBranch: present(env.SYSTEM_PULLREQUEST_SOURCEBRANCH),
    repository: present(env.BUILD_REPOSITORY_NAME),
  });
}

/**
 * Detect the CI platform from `env`.
 *
 * GitHub Actions wins when both platforms appear to be present.
 */
export async function detectPlatform(
  env: PlatformEnv,
  deps: PlatformDeps = {},
): Promise<PlatformContext> {
  if (env.GITHUB_ACTIONS === 'true') {
    return detectGitHub(env, deps);
  }
  if (env.TF_BUILD === 'True' || present(env.AGENT_ID) !== undefined) {
    return detectAzureDevOps(env);
  }
  return { platform: 'local' };
}
