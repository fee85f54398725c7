/**
 * CodeBuild source: source location, environment variables and buildspec.
 */

import { BatchGetProjectsCommand, CodeBuildClient, paginateListProjects, type Project } from '@aws-sdk/client-codebuild';
import { fromPaginator } from '../collector/listing-source.js';
import { requestOptions, toRecord, type AwsClientConfig } from './aws.js';
import { defineSource } from './define-source.js';
import type { ScanItem, ScanSource } from './types.js';

export const DEFAULT_BUILDSPEC = 'buildspec.yml';

export interface CodeBuildProjectDetail {
  projectName: string;
  source: string;
  environment: Record<string, string>;
  buildspec: string;
}

export function toProjectDetail(projectName: string, project: Project): CodeBuildProjectDetail {
  const buildspec = project.source?.buildspec;
  return {
    projectName,
    source: project.source?.location ?? '',
    environment: toRecord(project.environment?.environmentVariables, v => v.name, v => v.value),
    buildspec: buildspec ? buildspec : DEFAULT_BUILDSPEC,
  };
}

export function projectScanItems(detail: CodeBuildProjectDetail): ScanItem[] {
  return [{
    title: 'CodeBuild Project',
    resource: detail.projectName,
    targets: [
      { kind: 'text', section: 'Source', text: detail.source },
      { kind: 'variables', section: 'Environment Variables', values: detail.environment },
      { kind: 'text', section: 'Buildspec', text: detail.buildspec },
    ],
  }];
}

export function createCodeBuildSource(config: AwsClientConfig): ScanSource {
  const client = new CodeBuildClient(config);

  return defineSource<string, CodeBuildProjectDetail>({
    service: 'codebuild',
    label: 'CodeBuild Projects',
    list: () => fromPaginator(paginateListProjects({ client }, {}), page => page.projects ?? []),
    async fetch(projectName, signal) {
      const output = await client.send(new BatchGetProjectsCommand({ names: [projectName] }), requestOptions(signal));
      const project = output.projects?.[0];
      return project ? toProjectDetail(projectName, project) : null;
    },
    describe: projectName => projectName,
    extract: projectScanItems,
  });
}
