/**
 * S3 storage for detection reports and run summaries
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
} from "@aws-sdk/client-s3";

export class StorageClient {
  private s3: S3Client;
  readonly bucketName: string;

  constructor(bucketName?: string, region?: string, s3?: S3Client) {
    this.bucketName = bucketName || process.env.REPORT_BUCKET_NAME || "";
    const awsRegion = region || process.env.AWS_REGION || "us-east-1";

    if (!this.bucketName) {
      throw new Error("REPORT_BUCKET_NAME is required");
    }

    this.s3 =
      s3 ??
      new S3Client({
        region: awsRegion,
        credentials:
          process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY
            ? {
                accessKeyId: process.env.AWS_ACCESS_KEY_ID,
                secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
              }
            : undefined, // Default credentials chain
      });
  }

  async saveJson(key: string, data: unknown): Promise<void> {
    const jsonString = JSON.stringify(data, null, 2);

    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucketName,
          Key: key,
          Body: jsonString,
          ContentType: "application/json",
        }),
      );

      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "save_json_success",
          bucket: this.bucketName,
          key,
          size: jsonString.length,
        }),
      );
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "storage_client",
          action: "save_json_error",
          bucket: this.bucketName,
          key,
          error: error instanceof Error ? error.message : error,
        }),
      );
      throw error;
    }
  }

  async loadJson(key: string): Promise<unknown> {
    try {
      const response = await this.s3.send(
        new GetObjectCommand({
          Bucket: this.bucketName,
          Key: key,
        }),
      );

      if (!response.Body) {
        throw new Error("Empty response body");
      }

      const bodyString = await response.Body.transformToString("utf-8");
      return JSON.parse(bodyString);
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "storage_client",
          action: "load_json_error",
          bucket: this.bucketName,
          key,
          error: error instanceof Error ? error.message : error,
        }),
      );
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.s3.send(
        new HeadObjectCommand({
          Bucket: this.bucketName,
          Key: key,
        }),
      );
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === "NotFound" || error.name === "NoSuchKey") {
    return true;
  }
  return (
    "$metadata" in error &&
    typeof error.$metadata === "object" &&
    error.$metadata !== null &&
    "httpStatusCode" in error.$metadata &&
    error.$metadata.httpStatusCode === 404
  );
}

let storageClient: StorageClient | null = null;

/**
 * Shared client, or null when no report bucket is configured
 */
export function getStorageClient(): StorageClient | null {
  if (!process.env.REPORT_BUCKET_NAME) {
    return null;
  }
  if (!storageClient) {
    storageClient = new StorageClient();
  }
  return storageClient;
}
