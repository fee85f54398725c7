/**
 * Lambda source: deployment package code and environment variables of every
 * published version.
 */

import {
  GetFunctionCommand,
  LambdaClient,
  paginateListFunctions,
  paginateListVersionsByFunction,
} from '@aws-sdk/client-lambda';
import { isThrottlingError } from '../collector/retry-policy.js';
import { fromPaginator } from '../collector/listing-source.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { downloadZipText, requestOptions, type AwsClientConfig } from './aws.js';
import { defineSource } from './define-source.js';
import type { ScanItem, ScanSource } from './types.js';

const logger = createLogger('sources');

export const LATEST_VERSION = '$LATEST';

export interface LambdaVersionDetail {
  version: string;
  code: string;
  environment: Record<string, string>;
}

export interface LambdaFunctionDetail {
  functionName: string;
  versions: LambdaVersionDetail[];
}

/** `$LATEST` first, then numeric versions in descending order. */
export function compareLambdaVersions(a: string, b: string): number {
  if (a === b) return 0;
  if (a === LATEST_VERSION) return -1;
  if (b === LATEST_VERSION) return 1;

  const numberA = Number(a);
  const numberB = Number(b);
  if (Number.isInteger(numberA) && Number.isInteger(numberB)) {
    return numberB - numberA;
  }
  return b.localeCompare(a);
}

export function lambdaScanItems(detail: LambdaFunctionDetail): ScanItem[] {
  const versions = [...detail.versions].sort((a, b) => compareLambdaVersions(a.version, b.version));

  return [{
    title: 'Lambda Function',
    resource: detail.functionName,
    targets: versions.flatMap(({ version, code, environment }) => {
      const line = { name: 'Version', value: version };
      return [
        { kind: 'text' as const, section: 'Code', text: code, detail: line },
        { kind: 'variables' as const, section: 'Environment Variables', values: environment, detail: line },
      ];
    }),
  }];
}

export function createLambdaSource(config: AwsClientConfig): ScanSource {
  const client = new LambdaClient(config);

  async function fetchVersion(functionName: string, version: string, signal: AbortSignal): Promise<LambdaVersionDetail> {
    const output = await client.send(
      new GetFunctionCommand({ FunctionName: functionName, Qualifier: version }),
      requestOptions(signal)
    );

    const location = output.Code?.Location;
    let code = '';
    if (location) {
      try {
        code = await downloadZipText(location, signal);
      } catch (error) {
        signal.throwIfAborted();
        logger.warn({ functionName, version, error: errorMessage(error) }, 'Failed to download Lambda code');
      }
    } else {
      logger.warn({ functionName, version }, 'Empty code location');
    }

    return {
      version,
      code,
      environment: output.Configuration?.Environment?.Variables ?? {},
    };
  }

  return defineSource<string, LambdaFunctionDetail>({
    service: 'lambda',
    label: 'Lambda Functions',
    list: () => fromPaginator(
      paginateListFunctions({ client }, {}),
      page => (page.Functions ?? []).flatMap(fn => (fn.FunctionName ? [fn.FunctionName] : []))
    ),
    async fetch(functionName, signal) {
      const versionNames: string[] = [];
      for await (const page of paginateListVersionsByFunction({ client }, { FunctionName: functionName })) {
        signal.throwIfAborted();
        for (const version of page.Versions ?? []) {
          if (version.Version) versionNames.push(version.Version);
        }
      }

      const versions: LambdaVersionDetail[] = [];
      for (const version of versionNames) {
        try {
          versions.push(await fetchVersion(functionName, version, signal));
        } catch (error) {
          // Throttling restarts the whole function through the retry policy.
          if (isThrottlingError(error) || signal.aborted) throw error;
          logger.warn({ functionName, version, error: errorMessage(error) }, 'Failed to get function version');
        }
      }

      return { functionName, versions };
    },
    describe: functionName => functionName,
    extract: lambdaScanItems,
  });
}
