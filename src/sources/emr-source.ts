/**
 * EMR source: step arguments, bootstrap action arguments and bootstrap
 * scripts of active clusters.
 */

import {
  ClusterState,
  EMRClient,
  ListBootstrapActionsCommand,
  ListClustersCommand,
  ListStepsCommand,
} from '@aws-sdk/client-emr';
import { S3Client } from '@aws-sdk/client-s3';
import { fromTokenPages, listAll } from '../collector/listing-source.js';
import { downloadS3Text, type AwsClientConfig } from './aws.js';
import { defineSource } from './define-source.js';
import type { ScanItem, ScanSource, ScanTarget } from './types.js';

export const ACTIVE_CLUSTER_STATES: ClusterState[] = [
  ClusterState.RUNNING,
  ClusterState.WAITING,
  ClusterState.BOOTSTRAPPING,
  ClusterState.STARTING,
];

export interface EmrStep {
  name: string;
  args: string[];
}

export interface EmrBootstrapAction {
  name: string;
  scriptPath: string;
  args: string[];
  /** Empty unless the script lives in S3. */
  scriptContent: string;
}

export interface EmrClusterDetail {
  clusterId: string;
  steps: EmrStep[];
  bootstrapActions: EmrBootstrapAction[];
}

export function emrScanItems(detail: EmrClusterDetail): ScanItem[] {
  const targets: ScanTarget[] = [];

  detail.bootstrapActions.forEach((action, index) => {
    const name = action.name || `Bootstrap Action ${index + 1}`;
    targets.push({
      kind: 'text',
      section: 'Bootstrap Arguments',
      text: action.args.join(' '),
      detail: { name: 'EMR Step Name', value: name },
    });
    if (action.scriptContent) {
      targets.push({
        kind: 'text',
        section: 'Bootstrap Script',
        text: action.scriptContent,
        detail: { name: 'EMR Script Path', value: action.scriptPath },
      });
    }
  });

  for (const step of detail.steps) {
    targets.push({
      kind: 'text',
      section: 'Step Arguments',
      text: step.args.join(' '),
      detail: { name: 'EMR Step Name', value: step.name },
    });
  }

  return [{ title: 'EMR Cluster ID', resource: detail.clusterId, targets }];
}

export function createEmrSource(config: AwsClientConfig): ScanSource {
  const client = new EMRClient(config);
  const s3 = new S3Client(config);

  return defineSource<string, EmrClusterDetail>({
    service: 'emr',
    label: 'EMR Clusters',
    list: () => fromTokenPages(async (marker, signal) => {
      const output = await client.send(
        new ListClustersCommand({ ClusterStates: ACTIVE_CLUSTER_STATES, Marker: marker }),
        { abortSignal: signal }
      );
      return {
        items: (output.Clusters ?? []).flatMap(cluster => (cluster.Id ? [cluster.Id] : [])),
        nextToken: output.Marker,
      };
    }),
    async fetch(clusterId, signal) {
      const steps = await listAll(fromTokenPages(async marker => {
        const output = await client.send(new ListStepsCommand({ ClusterId: clusterId, Marker: marker }), { abortSignal: signal });
        return {
          items: (output.Steps ?? []).map(step => ({ name: step.Name ?? '', args: step.Config?.Args ?? [] })),
          nextToken: output.Marker,
        };
      }), signal);

      const actions = await listAll(fromTokenPages(async marker => {
        const output = await client.send(
          new ListBootstrapActionsCommand({ ClusterId: clusterId, Marker: marker }),
          { abortSignal: signal }
        );
        return { items: output.BootstrapActions ?? [], nextToken: output.Marker };
      }), signal);

      const bootstrapActions: EmrBootstrapAction[] = [];
      for (const action of actions) {
        const scriptPath = action.ScriptPath ?? '';
        bootstrapActions.push({
          name: action.Name ?? '',
          scriptPath,
          args: action.Args ?? [],
          scriptContent: scriptPath.startsWith('s3://') ? await downloadS3Text(s3, scriptPath, signal) : '',
        });
      }

      return { clusterId, steps, bootstrapActions };
    },
    describe: clusterId => clusterId,
    extract: emrScanItems,
  });
}
