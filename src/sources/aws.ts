/**
 * Shared AWS plumbing for the resource sources: client configuration,
 * S3 downloads and payload decoding.
 */

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { fromIni, fromNodeProviderChain } from '@aws-sdk/credential-providers';
import { unzipSync } from 'fflate';

export interface AwsConnection {
  region: string;
  /** Shared-config profile; the default provider chain is used when absent. */
  profile?: string;
}

export type AwsClientConfig = ReturnType<typeof createClientConfig>;

/** Region and credential provider shared by every service client. */
export function createClientConfig(connection: AwsConnection) {
  return {
    region: connection.region,
    credentials: connection.profile
      ? fromIni({ profile: connection.profile })
      : fromNodeProviderChain(),
  };
}

/** Per-request options forwarding the run's abort signal to the SDK. */
export function requestOptions(signal: AbortSignal): { abortSignal: AbortSignal } {
  return { abortSignal: signal };
}

// ═══════════════════════════════════════════════════════════════
// DECODING
// ═══════════════════════════════════════════════════════════════

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decodes standard, padded base64 (EC2 user data).
 * @throws Error for anything that is not strictly valid base64
 */
export function decodeBase64(encoded: string): string {
  const compact = encoded.replace(/\s+/g, '');
  if (!BASE64.test(compact)) {
    throw new Error('Invalid base64 payload');
  }
  return Buffer.from(compact, 'base64').toString('utf8');
}

/** Concatenates the text of every file in a zip archive, one newline after each. */
export function extractZipText(archive: Uint8Array): string {
  const files = unzipSync(archive);
  const decoder = new TextDecoder();
  let text = '';
  for (const [name, content] of Object.entries(files)) {
    if (name.endsWith('/')) continue;
    text += `${decoder.decode(content)}\n`;
  }
  return text;
}

// ═══════════════════════════════════════════════════════════════
// S3
// ═══════════════════════════════════════════════════════════════

export interface S3Location {
  bucket: string;
  key: string;
}

/**
 * Splits an `s3://bucket/key` URL.
 * @throws Error when the URL has no bucket or key
 */
export function parseS3Url(url: string): S3Location {
  const path = url.startsWith('s3://') ? url.slice('s3://'.length) : url;
  const slash = path.indexOf('/');
  if (slash <= 0 || slash === path.length - 1) {
    throw new Error(`Invalid S3 URL: ${url}`);
  }
  return { bucket: path.slice(0, slash), key: path.slice(slash + 1) };
}

/** Downloads an S3 object as UTF-8 text. */
export async function downloadS3Text(client: S3Client, url: string, signal: AbortSignal): Promise<string> {
  const { bucket, key } = parseS3Url(url);
  const output = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }), requestOptions(signal));
  if (!output.Body) return '';
  return output.Body.transformToString('utf-8');
}

/**
 * Downloads a deployment package from a presigned URL and returns the text
 * of every file inside it.
 */
export async function downloadZipText(url: string, signal: AbortSignal): Promise<string> {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new Error(`Code download returned ${response.status}`);
  }
  const archive = new Uint8Array(await response.arrayBuffer());
  return extractZipText(archive);
}

/** Converts optional SDK name/value pairs to a plain record, skipping nameless entries. */
export function toRecord<T>(
  entries: readonly T[] | undefined,
  key: (entry: T) => string | undefined,
  value: (entry: T) => string | undefined
): Record<string, string> {
  const record: Record<string, string> = {};
  for (const entry of entries ?? []) {
    const name = key(entry);
    if (!name) continue;
    record[name] = value(entry) ?? '';
  }
  return record;
}
