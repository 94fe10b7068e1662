/**
 * Secret Provider
 *
 * Reads a secret payload from Google Cloud Secret Manager. Client errors
 * (unreachable service, unknown secret or version, missing credentials)
 * propagate unchanged; there is no retry.
 *
 * Dependencies:
 * - @google-cloud/secret-manager: SecretManagerServiceClient
 */
import { SecretManagerServiceClient } from '@google-cloud/secret-manager';
import type { SecretRef } from '../config/index.js';
import { SecretNotFoundError } from '../utils/errors.js';
import { agentLogger } from '../utils/logger.js';

interface SecretAccessResponse {
  payload?: { data?: Uint8Array | string | null } | null;
}

/**
 * The slice of SecretManagerServiceClient this module calls
 */
export interface SecretVersionClient {
  secretVersionPath(project: string, secret: string, secretVersion: string): string;
  accessSecretVersion(request: { name: string }): Promise<readonly [SecretAccessResponse, ...unknown[]]>;
}

export async function getSecret(
  ref: SecretRef,
  client: SecretVersionClient = new SecretManagerServiceClient()
): Promise<string> {
  const name = client.secretVersionPath(ref.project, ref.secret, ref.version);
  agentLogger.debug(`[Secrets] Accessing ${name}`);

  const [response] = await client.accessSecretVersion({ name });
  const data = response.payload?.data;
  const value = typeof data === 'string' ? data : data ? Buffer.from(data).toString('utf-8') : '';

  if (!value) {
    throw new SecretNotFoundError(name);
  }
  return value;
}
