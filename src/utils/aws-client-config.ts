/**
 * AWS Client Configuration Helper
 *
 * Builds AWS SDK client configuration for the tracking and registry stores.
 *
 * Credential priority:
 * 1. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * 2. AWS_PROFILE, then the default profile, read from ~/.aws/credentials
 * 3. Default credential chain (nothing set here)
 *
 * An endpoint override points both DynamoDB and S3 at a local stand-in
 * (DynamoDB Local, MinIO); S3 then uses path-style addressing.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export interface AWSCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface AWSClientConfig {
  region?: string;
  endpoint?: string;
  credentials?: AWSCredentials;
}

export interface S3ClientConfig extends AWSClientConfig {
  forcePathStyle?: boolean;
}

/**
 * Read credentials for one profile from an ini-style credentials file
 */
export function parseCredentialsFile(content: string, profileName: string): AWSCredentials | null {
  let inProfile = false;
  let accessKeyId: string | undefined;
  let secretAccessKey: string | undefined;
  let sessionToken: string | undefined;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      if (inProfile) break;
      inProfile = trimmed === `[${profileName}]`;
      continue;
    }

    if (!inProfile) continue;

    const [key, ...rest] = trimmed.split('=');
    const value = rest.join('=').trim();
    switch (key.trim()) {
      case 'aws_access_key_id':
        accessKeyId = value;
        break;
      case 'aws_secret_access_key':
        secretAccessKey = value;
        break;
      case 'aws_session_token':
        sessionToken = value;
        break;
    }
  }

  if (accessKeyId && secretAccessKey) {
    return {
      accessKeyId,
      secretAccessKey,
      ...(sessionToken ? { sessionToken } : {}),
    };
  }
  return null;
}

function readCredentialsFromProfile(profileName: string): AWSCredentials | null {
  const credentialsPath = path.join(os.homedir(), '.aws', 'credentials');
  if (!fs.existsSync(credentialsPath)) {
    return null;
  }
  return parseCredentialsFile(fs.readFileSync(credentialsPath, 'utf-8'), profileName);
}

/**
 * Get AWS client configuration with credentials from environment
 */
export function getAWSClientConfig(region?: string, endpoint?: string): AWSClientConfig {
  const config: AWSClientConfig = {
    region: region || process.env.AWS_REGION,
    ...(endpoint ? { endpoint } : {}),
  };

  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
      ...(process.env.AWS_SESSION_TOKEN ? { sessionToken: process.env.AWS_SESSION_TOKEN } : {}),
    };
    return config;
  }

  const profileCredentials =
    (process.env.AWS_PROFILE ? readCredentialsFromProfile(process.env.AWS_PROFILE) : null) ??
    readCredentialsFromProfile('default');
  if (profileCredentials) {
    config.credentials = profileCredentials;
  }

  return config;
}

export function getS3ClientConfig(region?: string, endpoint?: string): S3ClientConfig {
  const config = getAWSClientConfig(region, endpoint);
  return endpoint ? { ...config, forcePathStyle: true } : config;
}
