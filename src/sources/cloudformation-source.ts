/**
 * CloudFormation sources: stack templates and parameters, stack set
 * templates and parameters.
 */

import {
  CloudFormationClient,
  DescribeStackSetCommand,
  DescribeStacksCommand,
  GetTemplateCommand,
  ListStackSetsCommand,
  StackStatus,
  paginateListStacks,
  type Parameter,
} from '@aws-sdk/client-cloudformation';
import { fromPaginator, fromTokenPages } from '../collector/listing-source.js';
import { requestOptions, toRecord, type AwsClientConfig } from './aws.js';
import { defineSource } from './define-source.js';
import type { ScanItem, ScanSource } from './types.js';

/** Deleted stacks keep their template for 90 days, so they are listed too. */
export const STACK_STATUS_FILTER: StackStatus[] = [
  StackStatus.CREATE_COMPLETE,
  StackStatus.UPDATE_COMPLETE,
  StackStatus.UPDATE_ROLLBACK_COMPLETE,
  StackStatus.IMPORT_COMPLETE,
  StackStatus.IMPORT_ROLLBACK_COMPLETE,
  StackStatus.DELETE_COMPLETE,
  StackStatus.DELETE_FAILED,
];

export interface StackRef {
  id: string;
  name: string;
}

export interface StackDetail {
  name: string;
  templateBody: string;
  parameters: Record<string, string>;
}

export function parametersToRecord(parameters: Parameter[] | undefined): Record<string, string> {
  return toRecord(parameters, p => p.ParameterKey, p => p.ParameterValue);
}

function stackScanItems(title: string): (detail: StackDetail) => ScanItem[] {
  return detail => [{
    title,
    resource: detail.name,
    targets: [
      { kind: 'text', section: 'Template', text: detail.templateBody },
      { kind: 'variables', section: 'Parameters', values: detail.parameters },
    ],
  }];
}

export const stackItems = stackScanItems('CloudFormation Stack');
export const stackSetItems = stackScanItems('CloudFormation Stack Set');

export function createStackSource(config: AwsClientConfig): ScanSource {
  const client = new CloudFormationClient(config);

  return defineSource<StackRef, StackDetail>({
    service: 'cloudformation',
    label: 'CloudFormation Stacks',
    list: () => fromPaginator(
      paginateListStacks({ client }, { StackStatusFilter: STACK_STATUS_FILTER }),
      page => (page.StackSummaries ?? []).flatMap(summary =>
        summary.StackId ? [{ id: summary.StackId, name: summary.StackName ?? summary.StackId }] : []
      )
    ),
    async fetch(ref, signal) {
      const template = await client.send(new GetTemplateCommand({ StackName: ref.id }), requestOptions(signal));
      const described = await client.send(new DescribeStacksCommand({ StackName: ref.id }), requestOptions(signal));

      return {
        name: ref.name,
        templateBody: template.TemplateBody ?? '',
        parameters: parametersToRecord(described.Stacks?.[0]?.Parameters),
      };
    },
    describe: ref => ref.name,
    extract: stackItems,
  });
}

export function createStackSetSource(config: AwsClientConfig): ScanSource {
  const client = new CloudFormationClient(config);

  return defineSource<StackRef, StackDetail>({
    service: 'cloudformation',
    label: 'CloudFormation Stack Sets',
    list: () => fromTokenPages(async (token, signal) => {
      const output = await client.send(new ListStackSetsCommand({ NextToken: token }), { abortSignal: signal });
      return {
        items: (output.Summaries ?? []).flatMap(summary =>
          summary.StackSetId ? [{ id: summary.StackSetId, name: summary.StackSetName ?? summary.StackSetId }] : []
        ),
        nextToken: output.NextToken,
      };
    }),
    async fetch(ref, signal) {
      const output = await client.send(new DescribeStackSetCommand({ StackSetName: ref.id }), requestOptions(signal));
      if (!output.StackSet) return null;

      return {
        name: ref.name,
        templateBody: output.StackSet.TemplateBody ?? '',
        parameters: parametersToRecord(output.StackSet.Parameters),
      };
    },
    describe: ref => `${ref.name} (${ref.id})`,
    extract: stackSetItems,
  });
}
