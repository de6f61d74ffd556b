import { S3Client, GetObjectCommand } from "@aws-sdk/client-s3";
import { Readable } from "stream";
import { NotFoundError } from "./errors";
import type { BlobSource } from "./storage";

export interface S3Config {
  endpoint: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  pathPrefix?: string;
  forcePathStyle?: boolean;
}

function isMissingKey(error: unknown): boolean {
  return error instanceof Error && (error.name === "NoSuchKey" || error.name === "NotFound");
}

export class S3BlobSource implements BlobSource {
  private client: S3Client;
  private bucket: string;
  private pathPrefix: string;

  constructor(config: S3Config, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        endpoint: config.endpoint,
        region: config.region,
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
        forcePathStyle: config.forcePathStyle ?? false,
      });
    this.bucket = config.bucket;
    this.pathPrefix = config.pathPrefix || "";
  }

  private key(relativePath: string): string {
    return this.pathPrefix + relativePath;
  }

  async open(relativePath: string): Promise<Readable> {
    const key = this.key(relativePath);
    const response = await this.client
      .send(new GetObjectCommand({ Bucket: this.bucket, Key: key }))
      .catch((err: unknown) => {
        if (isMissingKey(err)) throw new NotFoundError(`Blob ${key} not found`, { cause: err });
        throw err;
      });

    // Under Node the SDK hands back an http.IncomingMessage
    if (response.Body instanceof Readable) return response.Body;
    throw new Error(`S3 object ${key} has no readable body`);
  }
}
