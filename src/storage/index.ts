/**
 * Storage Module
 *
 * Responsibilities:
 * - StorageAdapter implementations: S3 (AWS SDK v3), local files, memory
 * - OutreachRepository: typed, validated round-trip of job, draft and contacts
 *
 * Storage paths:
 * - jobs/{job_id}/job.json
 * - jobs/{job_id}/draft.json
 * - jobs/{job_id}/contacts.json
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type GetObjectCommandOutput,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { StorageConfig } from '../config/index.js';
import { ContactRecordListSchema, fromRecord, toRecord } from '../contacts/index.js';
import { StorageError } from '../errors/index.js';
import { JOB_FAMILIES } from '../types/index.js';
import type {
  ArtifactMetadata,
  ArtifactType,
  Contact,
  JobId,
  JobPosting,
  OutreachDraft,
  StorageAdapter,
} from '../types/index.js';

export type { StorageAdapter };

const ARTIFACT_TYPES: readonly ArtifactType[] = ['job', 'draft', 'contacts'];

function fileNameFor(artifactType: ArtifactType): string {
  return `${artifactType}.json`;
}

function parseArtifactType(fileName: string): ArtifactType | null {
  return ARTIFACT_TYPES.find((type) => fileNameFor(type) === fileName) ?? null;
}

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

function errorName(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'name' in error ? error.name : undefined;
}

function calculateChecksum(content: string): string {
  return createHash('md5').update(Buffer.from(content, 'utf-8')).digest('hex');
}

function buildMetadata(jobId: JobId, artifactType: ArtifactType, content: string, createdAt: string): ArtifactMetadata {
  return {
    jobId,
    artifactType,
    fileName: fileNameFor(artifactType),
    createdAt,
    contentType: 'application/json',
    size: Buffer.byteLength(content, 'utf-8'),
    checksum: calculateChecksum(content),
  };
}

// ============================================================================
// S3
// ============================================================================

function isMissingObject(error: unknown): boolean {
  const name = errorName(error);
  return name === 'NotFound' || name === 'NoSuchKey';
}

export interface S3Config {
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'jobs') */
  prefix?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  forcePathStyle?: boolean;
}

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'jobs';

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }
    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = client ?? new S3Client(clientConfig);
  }

  private getKey(jobId: JobId, artifactType: ArtifactType): string {
    return `${this.prefix}/${jobId}/${fileNameFor(artifactType)}`;
  }

  async save(jobId: JobId, artifactType: ArtifactType, content: string): Promise<ArtifactMetadata> {
    const metadata = buildMetadata(jobId, artifactType, content, new Date().toISOString());

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(jobId, artifactType),
        Body: content,
        ContentType: metadata.contentType,
        Metadata: {
          'job-id': jobId,
          'artifact-type': artifactType,
          'created-at': metadata.createdAt,
          checksum: metadata.checksum ?? '',
        },
      })
    );

    return metadata;
  }

  async load(jobId: JobId, artifactType: ArtifactType): Promise<{ content: string; metadata: ArtifactMetadata }> {
    let response: GetObjectCommandOutput;
    try {
      response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(jobId, artifactType),
        })
      );
    } catch (error: unknown) {
      if (isMissingObject(error)) {
        throw new StorageError(`Artifact not found: ${jobId}/${artifactType}`, { cause: error });
      }
      throw error;
    }

    if (!response.Body) {
      throw new StorageError(`Artifact not found: ${jobId}/${artifactType}`);
    }

    const content = await response.Body.transformToString();

    const metadata: ArtifactMetadata = {
      jobId,
      artifactType,
      fileName: fileNameFor(artifactType),
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? 'application/json',
    };
    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }
    if (response.Metadata?.checksum) {
      metadata.checksum = response.Metadata.checksum;
    }

    return { content, metadata };
  }

  async exists(jobId: JobId, artifactType: ArtifactType): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(jobId, artifactType),
        })
      );
      return true;
    } catch (error: unknown) {
      if (isMissingObject(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(jobId: JobId): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: `${this.prefix}/${jobId}/`,
      })
    );

    const artifacts: ArtifactMetadata[] = [];
    for (const obj of response.Contents ?? []) {
      const fileName = obj.Key?.split('/').pop() ?? '';
      const artifactType = parseArtifactType(fileName);
      if (!artifactType) {
        continue;
      }
      const metadata: ArtifactMetadata = {
        jobId,
        artifactType,
        fileName,
        createdAt: obj.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: 'application/json',
      };
      if (obj.Size !== undefined) {
        metadata.size = obj.Size;
      }
      artifacts.push(metadata);
    }
    return artifacts;
  }

  async delete(jobId: JobId, artifactType?: ArtifactType): Promise<void> {
    const types = artifactType ? [artifactType] : (await this.list(jobId)).map((a) => a.artifactType);
    for (const type of types) {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(jobId, type),
        })
      );
    }
  }
}

// ============================================================================
// Local files
// ============================================================================

// fs errors may come from another realm, so match on the code alone
function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * One directory per job under dataDir; human-readable JSON files
 */
export class FileStorageAdapter implements StorageAdapter {
  private readonly dataDir: string;

  constructor(config: { dataDir: string }) {
    this.dataDir = config.dataDir;
  }

  private pathFor(jobId: JobId, artifactType: ArtifactType): string {
    return join(this.dataDir, jobId, fileNameFor(artifactType));
  }

  async save(jobId: JobId, artifactType: ArtifactType, content: string): Promise<ArtifactMetadata> {
    const path = this.pathFor(jobId, artifactType);
    const tmpPath = `${path}.${process.pid}.tmp`;
    await mkdir(join(this.dataDir, jobId), { recursive: true });
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, path);
    return buildMetadata(jobId, artifactType, content, new Date().toISOString());
  }

  async load(jobId: JobId, artifactType: ArtifactType): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const path = this.pathFor(jobId, artifactType);
    try {
      const [content, info] = await Promise.all([readFile(path, 'utf-8'), stat(path)]);
      return { content, metadata: buildMetadata(jobId, artifactType, content, info.mtime.toISOString()) };
    } catch (error) {
      if (isNotFound(error)) {
        throw new StorageError(`Artifact not found: ${jobId}/${artifactType}`, { cause: error });
      }
      throw error;
    }
  }

  async exists(jobId: JobId, artifactType: ArtifactType): Promise<boolean> {
    try {
      await stat(this.pathFor(jobId, artifactType));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(jobId: JobId): Promise<ArtifactMetadata[]> {
    let entries: string[];
    try {
      entries = await readdir(join(this.dataDir, jobId));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const artifacts: ArtifactMetadata[] = [];
    for (const entry of entries) {
      const artifactType = parseArtifactType(entry);
      if (artifactType) {
        artifacts.push((await this.load(jobId, artifactType)).metadata);
      }
    }
    return artifacts;
  }

  async delete(jobId: JobId, artifactType?: ArtifactType): Promise<void> {
    if (artifactType) {
      await rm(this.pathFor(jobId, artifactType), { force: true });
    } else {
      await rm(join(this.dataDir, jobId), { recursive: true, force: true });
    }
  }
}

// ============================================================================
// Memory
// ============================================================================

/**
 * In-memory storage adapter for testing and development
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string; metadata: ArtifactMetadata }> = new Map();

  private getKey(jobId: JobId, artifactType: ArtifactType): string {
    return `${jobId}/${artifactType}`;
  }

  async save(jobId: JobId, artifactType: ArtifactType, content: string): Promise<ArtifactMetadata> {
    const metadata = buildMetadata(jobId, artifactType, content, new Date().toISOString());
    this.store.set(this.getKey(jobId, artifactType), { content, metadata });
    return metadata;
  }

  async load(jobId: JobId, artifactType: ArtifactType): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const item = this.store.get(this.getKey(jobId, artifactType));
    if (!item) {
      throw new StorageError(`Artifact not found: ${jobId}/${artifactType}`);
    }
    return item;
  }

  async exists(jobId: JobId, artifactType: ArtifactType): Promise<boolean> {
    return this.store.has(this.getKey(jobId, artifactType));
  }

  async list(jobId: JobId): Promise<ArtifactMetadata[]> {
    const prefix = `${jobId}/`;
    const artifacts: ArtifactMetadata[] = [];
    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }
    return artifacts;
  }

  async delete(jobId: JobId, artifactType?: ArtifactType): Promise<void> {
    if (artifactType) {
      this.store.delete(this.getKey(jobId, artifactType));
      return;
    }
    const prefix = `${jobId}/`;
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }

  /**
   * Clear all stored artifacts (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

/**
 * Build the storage adapter named by configuration
 */
export function createStorageAdapter(config: StorageConfig): StorageAdapter {
  switch (config.type) {
    case 'memory':
      return new MemoryStorageAdapter();
    case 's3':
      return new S3StorageAdapter({ bucket: config.bucket, region: config.region });
    case 'file':
      return new FileStorageAdapter({ dataDir: config.dataDir });
  }
}

// ============================================================================
// Repository
// ============================================================================

const JobRecordSchema = z.object({
  url: z.string(),
  platform: z.string(),
  job_title: z.string(),
  company: z.string(),
  job_family: z.enum(JOB_FAMILIES),
  location: z.string().nullable(),
  description: z.string(),
  scraped_at: z.string(),
});

const DraftRecordSchema = z.object({
  subject: z.string(),
  body: z.string(),
  attachment_path: z.string().nullable().optional(),
});

/**
 * Typed access to a job's artifacts. Records are snake_case JSON, validated on load.
 */
export class OutreachRepository {
  constructor(private readonly storage: StorageAdapter) {}

  async saveJob(jobId: JobId, job: JobPosting): Promise<void> {
    const record: z.infer<typeof JobRecordSchema> = {
      url: job.url,
      platform: job.platform,
      job_title: job.jobTitle,
      company: job.company,
      job_family: job.jobFamily,
      location: job.location,
      description: job.description,
      scraped_at: job.scrapedAt,
    };
    await this.storage.save(jobId, 'job', JSON.stringify(record, null, 2));
  }

  async loadJob(jobId: JobId): Promise<JobPosting> {
    const record = await this.read(jobId, 'job', JobRecordSchema);
    return {
      url: record.url,
      platform: record.platform,
      jobTitle: record.job_title,
      company: record.company,
      jobFamily: record.job_family,
      location: record.location,
      description: record.description,
      scrapedAt: record.scraped_at,
    };
  }

  async saveDraft(jobId: JobId, draft: OutreachDraft): Promise<void> {
    const record = {
      subject: draft.subject,
      body: draft.body,
      attachment_path: draft.attachmentPath ?? null,
    };
    await this.storage.save(jobId, 'draft', JSON.stringify(record, null, 2));
  }

  /**
   * @returns null when no draft has been saved yet
   */
  async loadDraft(jobId: JobId): Promise<OutreachDraft | null> {
    if (!(await this.storage.exists(jobId, 'draft'))) {
      return null;
    }
    const record = await this.read(jobId, 'draft', DraftRecordSchema);
    const draft: OutreachDraft = { subject: record.subject, body: record.body };
    if (record.attachment_path) {
      draft.attachmentPath = record.attachment_path;
    }
    return draft;
  }

  async saveContacts(jobId: JobId, contacts: readonly Contact[]): Promise<void> {
    await this.storage.save(jobId, 'contacts', JSON.stringify(contacts.map(toRecord), null, 2));
  }

  /**
   * @returns an empty list when no contacts have been saved yet
   */
  async loadContacts(jobId: JobId): Promise<Contact[]> {
    if (!(await this.storage.exists(jobId, 'contacts'))) {
      return [];
    }
    const records = await this.read(jobId, 'contacts', ContactRecordListSchema);
    return records.map(fromRecord);
  }

  private async read<S extends z.ZodTypeAny>(jobId: JobId, artifactType: ArtifactType, schema: S): Promise<z.infer<S>> {
    const { content } = await this.storage.load(jobId, artifactType);

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`Artifact ${jobId}/${artifactType} is not valid JSON`, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new StorageError(`Artifact ${jobId}/${artifactType} failed validation: ${issues.join('; ')}`);
    }
    return parsed.data;
  }
}
