import {
  S3Client,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import type { Readable } from "node:stream";
import {
  createWriteStream,
  existsSync,
  mkdirSync,
  unlinkSync,
} from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import type { AppConfig } from "./config";
import type { StorageProvider } from "./interfaces";

export interface StorageAdapter {
  readonly provider: StorageProvider;
  saveStream(
    stream: Readable,
    key: string,
    contentType?: string
  ): Promise<string>;
  saveBuffer(
    buffer: Buffer,
    key: string,
    contentType?: string
  ): Promise<string>;
  getBuffer(key: string): Promise<Buffer>;
  exists(key: string): Promise<boolean>;
  delete(key: string): Promise<void>;
  getPublicUrl(key: string): Promise<string>;
}

interface SupabaseStorageOptions {
  projectUrl: string;
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
}

/**
 * Supabase Storage through its S3-compatible endpoint
 * (`<project>/storage/v1/s3`), so uploads and deletes go through the AWS SDK.
 */
export class SupabaseStorageAdapter implements StorageAdapter {
  readonly provider = "supabase" as const;
  private s3Client: S3Client;
  private bucketName: string;
  private projectUrl: string;

  constructor(options: SupabaseStorageOptions) {
    this.bucketName = options.bucket;
    this.projectUrl = options.projectUrl.replace(/\/+$/, "");
    this.s3Client = new S3Client({
      region: options.region,
      endpoint: `${this.projectUrl}/storage/v1/s3`,
      forcePathStyle: true,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
  }

  async saveStream(
    stream: Readable,
    key: string,
    contentType?: string
  ): Promise<string> {
    const upload = new Upload({
      client: this.s3Client,
      params: {
        Bucket: this.bucketName,
        Key: key,
        Body: stream,
        ContentType: contentType || "application/octet-stream",
      },
    });
    await upload.done();
    return key;
  }

  async saveBuffer(
    buffer: Buffer,
    key: string,
    contentType?: string
  ): Promise<string> {
    const upload = new Upload({
      client: this.s3Client,
      params: {
        Bucket: this.bucketName,
        Key: key,
        Body: buffer,
        ContentType: contentType || "application/octet-stream",
      },
    });
    await upload.done();
    return key;
  }

  async getBuffer(key: string): Promise<Buffer> {
    const command = new GetObjectCommand({ Bucket: this.bucketName, Key: key });
    const response = await this.s3Client.send(command);
    if (!response.Body) throw new Error(`File not found: ${key}`);
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.s3Client.send(
        new HeadObjectCommand({ Bucket: this.bucketName, Key: key })
      );
      return true;
    } catch (error) {
      if (
        error instanceof S3ServiceException &&
        error.$metadata.httpStatusCode === 404
      ) {
        return false;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    const command = new DeleteObjectCommand({
      Bucket: this.bucketName,
      Key: key,
    });
    await this.s3Client.send(command);
  }

  async getPublicUrl(key: string): Promise<string> {
    return `${this.projectUrl}/storage/v1/object/public/${this.bucketName}/${key}`;
  }
}

export class LocalStorageAdapter implements StorageAdapter {
  readonly provider = "local" as const;
  private basePath: string;
  private baseUrl: string;

  constructor(basePath: string, baseUrl: string) {
    this.basePath = resolve(basePath);
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    if (!existsSync(this.basePath)) {
      mkdirSync(this.basePath, { recursive: true });
    }
  }

  private pathFor(key: string): string {
    const filePath = resolve(join(this.basePath, key));
    if (!filePath.startsWith(this.basePath + sep)) {
      throw new Error(`Invalid storage key: ${key}`);
    }
    return filePath;
  }

  private ensureDir(filePath: string): void {
    const dir = dirname(filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }

  async saveStream(stream: Readable, key: string): Promise<string> {
    const filePath = this.pathFor(key);
    this.ensureDir(filePath);

    return new Promise((resolvePromise, reject) => {
      const writeStream = createWriteStream(filePath);
      stream.on("error", reject);
      writeStream.on("error", reject);
      writeStream.on("finish", () => resolvePromise(key));
      stream.pipe(writeStream);
    });
  }

  async saveBuffer(buffer: Buffer, key: string): Promise<string> {
    const filePath = this.pathFor(key);
    this.ensureDir(filePath);
    await writeFile(filePath, buffer);
    return key;
  }

  async getBuffer(key: string): Promise<Buffer> {
    const filePath = this.pathFor(key);
    if (!existsSync(filePath)) throw new Error(`File not found: ${key}`);
    return readFile(filePath);
  }

  async exists(key: string): Promise<boolean> {
    return existsSync(this.pathFor(key));
  }

  async delete(key: string): Promise<void> {
    const filePath = this.pathFor(key);
    if (existsSync(filePath)) unlinkSync(filePath);
  }

  async getPublicUrl(key: string): Promise<string> {
    return `${this.baseUrl}/${key}`;
  }
}

let storageInstance: StorageAdapter | null = null;

export function createStorage(config: AppConfig): StorageAdapter {
  if (config.STORAGE_TYPE === "supabase") {
    return new SupabaseStorageAdapter({
      projectUrl: config.SUPABASE_URL ?? "",
      bucket: config.SUPABASE_STORAGE_BUCKET,
      region: config.SUPABASE_S3_REGION,
      accessKeyId: config.SUPABASE_S3_ACCESS_KEY_ID ?? "",
      secretAccessKey: config.SUPABASE_S3_SECRET_ACCESS_KEY ?? "",
    });
  }
  return new LocalStorageAdapter(
    config.LOCAL_STORAGE_PATH,
    config.LOCAL_STORAGE_URL
  );
}

export function getStorage(config: AppConfig): StorageAdapter {
  if (!storageInstance) {
    storageInstance = createStorage(config);
  }
  return storageInstance;
}
