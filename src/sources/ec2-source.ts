/**
 * EC2 sources: instance user data and launch template user data (every version).
 */

import {
  DescribeInstanceAttributeCommand,
  EC2Client,
  InstanceAttributeName,
  paginateDescribeInstances,
  paginateDescribeLaunchTemplateVersions,
  paginateDescribeLaunchTemplates,
  type LaunchTemplateVersion,
} from '@aws-sdk/client-ec2';
import { fromPaginator } from '../collector/listing-source.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { decodeBase64, requestOptions, type AwsClientConfig } from './aws.js';
import { defineSource } from './define-source.js';
import type { ScanItem, ScanSource } from './types.js';

const logger = createLogger('sources');

export interface InstanceDetail {
  instanceId: string;
  userData: string;
}

export interface LaunchTemplateRef {
  id: string;
  name: string;
}

export interface LaunchTemplateDetail {
  id: string;
  name: string;
  versions: Array<{ version: number; userData: string }>;
}

/** Decodes the user data of one instance; absent user data is an empty string. */
export function toInstanceDetail(instanceId: string, encodedUserData: string | undefined): InstanceDetail {
  return {
    instanceId,
    userData: encodedUserData ? decodeBase64(encodedUserData) : '',
  };
}

/**
 * Decodes every launch template version. A version with undecodable user
 * data is logged and left out.
 */
export function toLaunchTemplateDetail(ref: LaunchTemplateRef, versions: LaunchTemplateVersion[]): LaunchTemplateDetail {
  const decoded: LaunchTemplateDetail['versions'] = [];

  for (const version of versions) {
    const versionNumber = version.VersionNumber ?? 0;
    const encoded = version.LaunchTemplateData?.UserData;
    try {
      decoded.push({ version: versionNumber, userData: encoded ? decodeBase64(encoded) : '' });
    } catch (error) {
      logger.warn({ template: ref.name, version: versionNumber, error: errorMessage(error) }, 'Failed to decode launch template user data');
    }
  }

  return { id: ref.id, name: ref.name, versions: decoded };
}

export function instanceScanItems(detail: InstanceDetail): ScanItem[] {
  return [{
    title: 'Instance ID',
    resource: detail.instanceId,
    targets: [{ kind: 'text', section: 'User Data', text: detail.userData }],
  }];
}

export function launchTemplateScanItems(detail: LaunchTemplateDetail): ScanItem[] {
  return [{
    title: 'Launch Template',
    resource: detail.name,
    targets: detail.versions.map(({ version, userData }) => ({
      kind: 'text' as const,
      section: 'User Data',
      text: userData,
      detail: { name: 'Version', value: String(version) },
    })),
  }];
}

export function createEc2InstanceSource(config: AwsClientConfig): ScanSource {
  const client = new EC2Client(config);

  return defineSource<string, InstanceDetail>({
    service: 'ec2',
    label: 'EC2 Instances',
    list: () => fromPaginator(
      paginateDescribeInstances({ client }, {}),
      page => (page.Reservations ?? [])
        .flatMap(reservation => reservation.Instances ?? [])
        .flatMap(instance => (instance.InstanceId ? [instance.InstanceId] : []))
    ),
    async fetch(instanceId, signal) {
      const output = await client.send(
        new DescribeInstanceAttributeCommand({ InstanceId: instanceId, Attribute: InstanceAttributeName.userData }),
        requestOptions(signal)
      );
      return toInstanceDetail(instanceId, output.UserData?.Value);
    },
    describe: instanceId => instanceId,
    extract: instanceScanItems,
  });
}

export function createLaunchTemplateSource(config: AwsClientConfig): ScanSource {
  const client = new EC2Client(config);

  return defineSource<LaunchTemplateRef, LaunchTemplateDetail>({
    service: 'ec2',
    label: 'Launch Templates',
    list: () => fromPaginator(
      paginateDescribeLaunchTemplates({ client }, {}),
      page => (page.LaunchTemplates ?? []).flatMap(template =>
        template.LaunchTemplateId
          ? [{ id: template.LaunchTemplateId, name: template.LaunchTemplateName ?? template.LaunchTemplateId }]
          : []
      )
    ),
    async fetch(ref, signal) {
      const versions: LaunchTemplateVersion[] = [];
      for await (const page of paginateDescribeLaunchTemplateVersions({ client }, { LaunchTemplateId: ref.id })) {
        signal.throwIfAborted();
        versions.push(...(page.LaunchTemplateVersions ?? []));
      }
      return toLaunchTemplateDetail(ref, versions);
    },
    describe: ref => ref.name,
    extract: launchTemplateScanItems,
  });
}
