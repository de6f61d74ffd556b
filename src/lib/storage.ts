import { createReadStream } from "fs";
import { stat } from "fs/promises";
import { resolve, normalize, sep } from "path";
import type { Readable } from "stream";
import { NotFoundError } from "./errors";
import { S3BlobSource, type S3Config } from "./storage-s3";

/**
 * Read-only access to uploaded log blobs.
 *
 * Uploads land on the local filesystem in traditional deployments; set the
 * S3_* variables to read them from an S3-compatible bucket instead.
 *
 * Usage:
 *   const source = createBlobSource(settings);
 *   const stream = await source.open("uploads/upload-123.log");
 */
export interface BlobSource {
  /** Open a blob as a byte stream. Throws NotFoundError when the key does not exist. */
  open(key: string): Promise<Readable>;
}

export class LocalBlobSource implements BlobSource {
  private basePath: string;

  constructor(basePath: string = process.cwd()) {
    this.basePath = normalize(resolve(basePath));
  }

  private resolve(relativePath: string): string {
    const fullPath = resolve(this.basePath, relativePath);
    if (fullPath !== this.basePath && !fullPath.startsWith(this.basePath + sep)) {
      throw new Error("Path traversal detected");
    }
    return fullPath;
  }

  async open(key: string): Promise<Readable> {
    const fullPath = this.resolve(key);
    const info = await stat(fullPath).catch((err: unknown) => {
      throw new NotFoundError(`Blob ${key} not found`, { cause: err });
    });
    if (!info.isFile()) throw new NotFoundError(`Blob ${key} is not a file`);
    return createReadStream(fullPath);
  }
}

export function createBlobSource(config: { uploadDir: string; s3: S3Config | null }): BlobSource {
  if (config.s3) {
    return new S3BlobSource(config.s3);
  }
  return new LocalBlobSource(config.uploadDir);
}
