/**
 * Sources Module - Public API
 *
 * One or more scan sources per AWS service.
 */

import type { AwsClientConfig } from './aws.js';
import { createStackSetSource, createStackSource } from './cloudformation-source.js';
import { createCodeBuildSource } from './codebuild-source.js';
import { createEc2InstanceSource, createLaunchTemplateSource } from './ec2-source.js';
import { createEmrSource } from './emr-source.js';
import { createGlueSource } from './glue-source.js';
import { createLambdaSource } from './lambda-source.js';
import { createSageMakerSource } from './sagemaker-source.js';
import type { ScanSource, ServiceName } from './types.js';

export const SOURCE_FACTORIES: Readonly<Record<ServiceName, ReadonlyArray<(config: AwsClientConfig) => ScanSource>>> = {
  ec2: [createEc2InstanceSource, createLaunchTemplateSource],
  lambda: [createLambdaSource],
  cloudformation: [createStackSource, createStackSetSource],
  sagemaker: [createSageMakerSource],
  codebuild: [createCodeBuildSource],
  glue: [createGlueSource],
  emr: [createEmrSource],
};

/** Builds the sources of the given services, in the order given. */
export function createSources(services: readonly ServiceName[], config: AwsClientConfig): ScanSource[] {
  return services.flatMap(service => SOURCE_FACTORIES[service].map(factory => factory(config)));
}

export { defineSource } from './define-source.js';
export { createClientConfig, decodeBase64, parseS3Url, extractZipText } from './aws.js';
export type { AwsConnection, AwsClientConfig, S3Location } from './aws.js';
export type {
  DetailLine,
  ResourceSourceDefinition,
  ScanItem,
  ScanSource,
  ScanTarget,
  ServiceName,
  SourceCollection,
  SourceRunOptions,
} from './types.js';
