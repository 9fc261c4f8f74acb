/**
 * Configuration from the shared AWS config and credentials files
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_REGION } from './defaults.js';
import type { Environment } from './env.js';
import { parseIni, type IniDocument, type IniSection } from './ini.js';
import type { S3ClientConfig } from './types.js';

export interface ProfileOptions {
  /** Default: default */
  profile?: string;
  /** Default: ~/.aws/config */
  configPath?: string;
  /** Default: ~/.aws/credentials */
  credentialsPath?: string;
  /** Consulted for AWS_DEFAULT_REGION. Default: process.env */
  env?: Environment;
}

/**
 * Build client configuration for a bucket from a named profile.
 *
 * Values in the credentials file win over the config file, where profiles
 * other than `default` live in `[profile <name>]` sections. Region falls
 * back to AWS_DEFAULT_REGION, then us-east-1. `endpoint_url` is read from
 * the profile itself or from its nested `s3` block. Missing files are
 * treated as empty.
 *
 * @throws {ConfigurationError} If either access key setting is missing
 */
export async function loadProfileConfig(
  bucket: string,
  options: ProfileOptions = {}
): Promise<S3ClientConfig> {
  const profile = options.profile ?? 'default';
  const configPath = options.configPath ?? join(homedir(), '.aws', 'config');
  const credentialsPath = options.credentialsPath ?? join(homedir(), '.aws', 'credentials');
  const env = options.env ?? process.env;

  const configFile = await readIniFile(configPath);
  const credentialsFile = await readIniFile(credentialsPath);

  const configSection = configFile[profile === 'default' ? 'default' : `profile ${profile}`];
  const credentialsSection = credentialsFile[profile];

  const lookup = (name: string): string | undefined =>
    credentialsSection?.values[name] || configSection?.values[name] || undefined;

  const accessKeyId = lookup('aws_access_key_id');
  const secretAccessKey = lookup('aws_secret_access_key');

  if (!accessKeyId) {
    throw ConfigurationError.missingSetting(
      'aws_access_key_id',
      `aws_access_key_id not found for profile '${profile}' in config or credentials files`
    );
  }
  if (!secretAccessKey) {
    throw ConfigurationError.missingSetting(
      'aws_secret_access_key',
      `aws_secret_access_key not found for profile '${profile}' in config or credentials files`
    );
  }

  return {
    accessKeyId,
    secretAccessKey,
    sessionToken: lookup('aws_session_token'),
    region: lookup('region') || env['AWS_DEFAULT_REGION'] || DEFAULT_REGION,
    endpoint: lookup('endpoint_url') ?? s3EndpointUrl(credentialsSection) ?? s3EndpointUrl(configSection),
    bucket,
  };
}

function s3EndpointUrl(section: IniSection | undefined): string | undefined {
  return section?.nested['s3']?.['endpoint_url'] || undefined;
}

async function readIniFile(path: string): Promise<IniDocument> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw new ConfigurationError({
      message: `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
      code: 'CONFIG_FILE_UNREADABLE',
      details: { path },
      cause: error,
    });
  }
  return parseIni(text);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
