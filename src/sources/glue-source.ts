/**
 * Glue source: script location, script content from S3 and default arguments.
 */

import { GetJobCommand, GlueClient, ListJobsCommand } from '@aws-sdk/client-glue';
import { S3Client } from '@aws-sdk/client-s3';
import { fromTokenPages } from '../collector/listing-source.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { downloadS3Text, requestOptions, type AwsClientConfig } from './aws.js';
import { defineSource } from './define-source.js';
import type { ScanItem, ScanSource } from './types.js';

const logger = createLogger('sources');

export interface GlueJobDetail {
  jobName: string;
  scriptLocation: string;
  scriptContent: string;
  arguments: Record<string, string>;
}

export function glueScanItems(detail: GlueJobDetail): ScanItem[] {
  return [{
    title: 'Glue Job',
    resource: detail.jobName,
    targets: [
      { kind: 'text', section: 'Script Location', text: detail.scriptLocation },
      { kind: 'text', section: 'Script Content', text: detail.scriptContent },
      { kind: 'parameters', section: 'Job Parameters', values: detail.arguments },
    ],
  }];
}

export function createGlueSource(config: AwsClientConfig): ScanSource {
  const client = new GlueClient(config);
  const s3 = new S3Client(config);

  return defineSource<string, GlueJobDetail>({
    service: 'glue',
    label: 'Glue Jobs',
    list: () => fromTokenPages(async (token, signal) => {
      const output = await client.send(new ListJobsCommand({ NextToken: token }), { abortSignal: signal });
      return { items: output.JobNames ?? [], nextToken: output.NextToken };
    }),
    async fetch(jobName, signal) {
      const output = await client.send(new GetJobCommand({ JobName: jobName }), requestOptions(signal));
      if (!output.Job) return null;

      const scriptLocation = output.Job.Command?.ScriptLocation ?? '';
      let scriptContent = '';
      if (scriptLocation) {
        try {
          scriptContent = await downloadS3Text(s3, scriptLocation, signal);
        } catch (error) {
          signal.throwIfAborted();
          logger.warn({ jobName, scriptLocation, error: errorMessage(error) }, 'Failed to download Glue script');
        }
      }

      return {
        jobName,
        scriptLocation,
        scriptContent,
        arguments: { ...(output.Job.DefaultArguments ?? {}) },
      };
    },
    describe: jobName => jobName,
    extract: glueScanItems,
  });
}
