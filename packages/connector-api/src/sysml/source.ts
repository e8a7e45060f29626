import type { ElementSource, Logger } from '@sysml-sql/core';
import type { SysmlApiClient } from './client.js';
import {
  selectCommit,
  selectProject,
  type CommitSelector,
  type ProjectSelector,
} from './selection.js';

export interface SysmlModelSourceConfig {
  client: SysmlApiClient;
  project: ProjectSelector;
  commit: CommitSelector;
  pageSize?: number;
  logger?: Logger;
}

/** Where the last `readElements()` took its elements from */
export interface ResolvedModel {
  projectId: string;
  projectName: string;
  commitId: string;
}

/**
 * Elements of one commit on a SysML v2 API server
 */
export class SysmlModelSource implements ElementSource {
  private resolvedModel?: ResolvedModel;

  constructor(private readonly config: SysmlModelSourceConfig) {}

  get resolved(): ResolvedModel | undefined {
    return this.resolvedModel;
  }

  describe(): string {
    const { project, commit } = this.config;
    const projectPart = project.by === 'id' ? `project ${project.id}` : `project "${project.name}"`;
    let commitPart: string;
    switch (commit.by) {
      case 'commit':
        commitPart = `commit ${commit.id}`;
        break;
      case 'branch-id':
        commitPart = `head of branch ${commit.id}`;
        break;
      case 'branch-name':
        commitPart = `head of branch "${commit.name}"`;
        break;
      case 'default-branch':
        commitPart = 'head of the default branch';
        break;
    }
    return `${this.config.client.baseUrl} ${projectPart}, ${commitPart}`;
  }

  async readElements(): Promise<unknown[]> {
    const { client, logger } = this.config;
    const project = await selectProject(client, this.config.project);
    logger?.info('Selected project', { project: project.name, projectId: project['@id'] });
    const commitId = await selectCommit(client, project, this.config.commit, logger);

    const records = await client.fetchElements(project['@id'], commitId, {
      pageSize: this.config.pageSize,
    });
    this.resolvedModel = { projectId: project['@id'], projectName: project.name, commitId };
    return records;
  }
}
