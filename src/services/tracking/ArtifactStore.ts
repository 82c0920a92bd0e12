import { S3Client, PutObjectCommand, GetObjectCommand, DeleteObjectCommand } from '@aws-sdk/client-s3';
import { ArtifactSchema, ModelArtifact } from '../../types/ModelArtifactTypes';
import { ArtifactNotFoundError } from '../../types/ModelGateErrors';
import { Logger } from '../core/Logger';
import { errorMessage, isObjectNotFound } from '../../utils/aws-errors';

const ARTIFACT_FILE = 'model.json';

interface ObjectLocation {
  bucket: string;
  key: string;
}

export function parseArtifactUri(uri: string): ObjectLocation | null {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri);
  return match ? { bucket: match[1], key: match[2] } : null;
}

/**
 * ArtifactStore - model artifacts as JSON objects in S3, one per run
 */
export class ArtifactStore {
  constructor(
    private s3Client: S3Client,
    private bucket: string,
    private prefix: string,
    private logger: Logger
  ) {}

  uriFor(runId: string): string {
    return `s3://${this.bucket}/${this.prefix}/${runId}/${ARTIFACT_FILE}`;
  }

  async put(runId: string, artifact: ModelArtifact): Promise<string> {
    const uri = this.uriFor(runId);
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: `${this.prefix}/${runId}/${ARTIFACT_FILE}`,
        Body: JSON.stringify(artifact, null, 2),
        ContentType: 'application/json',
      })
    );
    this.logger.debug('Artifact stored', { runId, uri });
    return uri;
  }

  /**
   * Load and validate an artifact; a missing or unparseable object is ArtifactNotFound
   */
  async get(runId: string, uri: string): Promise<ModelArtifact> {
    const location = parseArtifactUri(uri);
    if (!location) {
      throw new ArtifactNotFoundError(runId, `unrecognized artifact URI ${uri}`);
    }

    let body: string | undefined;
    try {
      const result = await this.s3Client.send(new GetObjectCommand({ Bucket: location.bucket, Key: location.key }));
      body = await result.Body?.transformToString();
    } catch (error) {
      if (isObjectNotFound(error)) {
        throw new ArtifactNotFoundError(runId, `no object at ${uri}`);
      }
      this.logger.error('Failed to read artifact', { runId, uri, error: errorMessage(error) });
      throw error;
    }

    if (!body) {
      throw new ArtifactNotFoundError(runId, `empty object at ${uri}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new ArtifactNotFoundError(runId, `corrupt artifact at ${uri}: ${errorMessage(error)}`);
    }

    const result = ArtifactSchema.safeParse(parsed);
    if (!result.success) {
      throw new ArtifactNotFoundError(runId, `corrupt artifact at ${uri}: ${result.error.issues[0]?.message}`);
    }
    return result.data;
  }

  async delete(uri: string): Promise<void> {
    const location = parseArtifactUri(uri);
    if (!location) return;
    await this.s3Client.send(new DeleteObjectCommand({ Bucket: location.bucket, Key: location.key }));
    this.logger.debug('Artifact deleted', { uri });
  }
}
