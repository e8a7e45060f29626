/**
 * Project and commit selection
 *
 * Names are matched by prefix; an exact name wins over prefix matches, and a
 * prefix matching several candidates is an error listing them.
 */

import { FetchError, type Logger } from '@sysml-sql/core';
import type { Branch, Project } from './api-types.js';
import type { SysmlApiClient } from './client.js';

export type ProjectSelector = { by: 'id'; id: string } | { by: 'name'; name: string };

export type CommitSelector =
  | { by: 'commit'; id: string }
  | { by: 'branch-id'; id: string }
  | { by: 'branch-name'; name: string }
  | { by: 'default-branch' };

interface Named {
  '@id': string;
  name: string;
}

function describeCandidates(items: readonly Named[]): string {
  return items.map((item) => `"${item.name}" (${item['@id']})`).join(', ');
}

/**
 * The one item whose name is `name`, or else starts with it
 */
export function matchByName<T extends Named>(items: readonly T[], name: string, what: string): T {
  const exact = items.filter((item) => item.name === name);
  if (exact.length === 1) return exact[0];

  const matches = exact.length > 1 ? exact : items.filter((item) => item.name.startsWith(name));
  if (matches.length === 1) return matches[0];

  if (matches.length === 0) {
    throw new FetchError({
      code: 'SELECTION_FAILED',
      message: `No ${what} name starts with "${name}"`,
      suggestion: items.length
        ? `Available: ${describeCandidates(items)}`
        : `The server has no ${what}.`,
      context: { name, candidates: items.map((item) => item.name) },
    });
  }
  throw new FetchError({
    code: 'SELECTION_FAILED',
    message: `${matches.length} ${what} names match "${name}": ${describeCandidates(matches)}`,
    suggestion: `Give a longer name or select the ${what} by id.`,
    context: { name, candidates: matches.map((item) => item.name) },
  });
}

export async function selectProject(
  client: SysmlApiClient,
  selector: ProjectSelector
): Promise<Project> {
  if (selector.by === 'id') return client.getProject(selector.id);
  return matchByName(await client.listProjects(), selector.name, 'project');
}

function headOf(branch: Branch): string {
  if (!branch.head) {
    throw new FetchError({
      code: 'SELECTION_FAILED',
      message: `Branch "${branch.name}" (${branch['@id']}) has no head commit`,
      suggestion: 'Select a commit by id instead.',
      context: { branchId: branch['@id'] },
    });
  }
  return branch.head['@id'];
}

/**
 * Commit id a selector points at within `project`
 */
export async function selectCommit(
  client: SysmlApiClient,
  project: Project,
  selector: CommitSelector,
  logger?: Logger
): Promise<string> {
  const projectId = project['@id'];
  let branch: Branch;

  switch (selector.by) {
    case 'commit':
      return selector.id;
    case 'branch-id':
      branch = await client.getBranch(projectId, selector.id);
      break;
    case 'branch-name':
      branch = matchByName(await client.listBranches(projectId), selector.name, 'branch');
      break;
    case 'default-branch': {
      if (!project.defaultBranch) {
        throw new FetchError({
          code: 'SELECTION_FAILED',
          message: `Project "${project.name}" (${projectId}) has no default branch`,
          suggestion: 'Pass --branch-name, --branch-id or --commit-id.',
          context: { projectId },
        });
      }
      branch = await client.getBranch(projectId, project.defaultBranch['@id']);
      break;
    }
  }

  const commitId = headOf(branch);
  logger?.info('Selected branch', { branch: branch.name, branchId: branch['@id'], commitId });
  return commitId;
}
