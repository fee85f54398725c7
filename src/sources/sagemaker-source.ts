/**
 * SageMaker source: processing job names and environments.
 */

import { DescribeProcessingJobCommand, ListProcessingJobsCommand, SageMakerClient } from '@aws-sdk/client-sagemaker';
import { fromTokenPages } from '../collector/listing-source.js';
import { requestOptions, type AwsClientConfig } from './aws.js';
import { defineSource } from './define-source.js';
import type { ScanItem, ScanSource } from './types.js';

export interface ProcessingJobDetail {
  jobName: string;
  environment: Record<string, string>;
}

export function processingJobScanItems(detail: ProcessingJobDetail): ScanItem[] {
  return [{
    title: 'SageMaker Job',
    resource: detail.jobName,
    targets: [
      { kind: 'text', section: 'Job Name', text: detail.jobName },
      { kind: 'variables', section: 'Environment', values: detail.environment },
    ],
  }];
}

export function createSageMakerSource(config: AwsClientConfig): ScanSource {
  const client = new SageMakerClient(config);

  return defineSource<string, ProcessingJobDetail>({
    service: 'sagemaker',
    label: 'SageMaker Processing Jobs',
    list: () => fromTokenPages(async (token, signal) => {
      const output = await client.send(new ListProcessingJobsCommand({ NextToken: token }), { abortSignal: signal });
      return {
        items: (output.ProcessingJobSummaries ?? []).flatMap(job => (job.ProcessingJobName ? [job.ProcessingJobName] : [])),
        nextToken: output.NextToken,
      };
    }),
    async fetch(jobName, signal) {
      const output = await client.send(
        new DescribeProcessingJobCommand({ ProcessingJobName: jobName }),
        requestOptions(signal)
      );
      return {
        jobName: output.ProcessingJobName ?? jobName,
        environment: { ...(output.Environment ?? {}) },
      };
    },
    describe: jobName => jobName,
    extract: processingJobScanItems,
  });
}
