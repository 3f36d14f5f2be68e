/**
 * Artifact Storage
 * Images, story data and documents of a project live under one namespace
 * (`<slug>-<id8>`). Backends: local directory, Google Cloud Storage, memory.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join, resolve, sep } from 'path';
import { pathToFileURL } from 'url';
import { Storage } from '@google-cloud/storage';
import { logger } from '@/config/logger.js';
import type { ImageArtifact, Project } from '@/shared/types.js';
import { slugify } from '@/shared/utils.js';
import { handleGCSError } from '@/utils/errorHandling.js';

/** Any stored artifact; images, story data and documents share the shape */
export type StoredArtifact = ImageArtifact;

export interface IArtifactStore {
  put(namespace: string, key: string, data: Buffer, mimeType: string): Promise<StoredArtifact>;
  /** Read back the bytes of an artifact by its id */
  get(artifactId: string): Promise<Buffer>;
}

export function projectNamespace(project: Pick<Project, 'slug' | 'id'>): string {
  return `${project.slug}-${project.id.slice(0, 8)}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export const artifactKeys = {
  styleReference: (ext: string) => `images/style_reference.${ext}`,
  /** The ordinal (1-based position in the cast) keeps names that slug alike apart */
  character: (ordinal: number, name: string, ext: string) =>
    `images/character_${pad2(ordinal)}_${slugify(name).replace(/-/g, '_') || 'unnamed'}.${ext}`,
  /** revision 0 is the first render; later regenerations get an `_rK` suffix */
  page: (pageIndex: number, revision: number, ext: string) =>
    `images/page_${pad2(pageIndex)}${revision > 0 ? `_r${revision}` : ''}.${ext}`,
  storyData: () => 'story_data.json',
  document: () => 'storybook.pdf',
};

export class LocalArtifactStore implements IArtifactStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
    logger.info('Local artifact store initialized', { rootDir: this.rootDir });
  }

  async put(namespace: string, key: string, data: Buffer, mimeType: string): Promise<StoredArtifact> {
    const id = `${namespace}/${key}`;
    const filePath = this.resolvePath(id);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, data);

    logger.debug('Artifact written', { id, size: data.length, mimeType });
    return { id, uri: pathToFileURL(filePath).href, mimeType, byteLength: data.length };
  }

  async get(artifactId: string): Promise<Buffer> {
    return readFile(this.resolvePath(artifactId));
  }

  private resolvePath(artifactId: string): string {
    const filePath = resolve(join(this.rootDir, artifactId));
    if (!filePath.startsWith(this.rootDir + sep)) {
      throw new Error(`Artifact id escapes the store root: ${artifactId}`);
    }
    return filePath;
  }
}

export class GcsArtifactStore implements IArtifactStore {
  private storage: Storage;
  private bucketName: string;

  constructor(config: { bucketName: string; projectId?: string | undefined }) {
    this.storage = new Storage(config.projectId ? { projectId: config.projectId } : {});
    this.bucketName = config.bucketName;

    logger.info('GCS artifact store initialized', {
      projectId: config.projectId,
      bucketName: this.bucketName,
    });
  }

  async put(namespace: string, key: string, data: Buffer, mimeType: string): Promise<StoredArtifact> {
    const id = `${namespace}/${key}`;
    try {
      const file = this.storage.bucket(this.bucketName).file(id);
      await file.save(data, {
        metadata: {
          contentType: mimeType,
        },
      });

      const publicUrl = `https://storage.googleapis.com/${this.bucketName}/${id}`;
      logger.info('File uploaded successfully', { id, publicUrl, size: data.length });
      return { id, uri: publicUrl, mimeType, byteLength: data.length };
    } catch (error) {
      logger.error(
        'Failed to upload file',
        handleGCSError(error, {
          id,
          size: data.length,
          contentType: mimeType,
          bucketName: this.bucketName,
          operation: 'put',
        }),
      );
      throw error;
    }
  }

  async get(artifactId: string): Promise<Buffer> {
    try {
      const [contents] = await this.storage.bucket(this.bucketName).file(artifactId).download();
      return contents;
    } catch (error) {
      logger.error(
        'Failed to download file',
        handleGCSError(error, { id: artifactId, bucketName: this.bucketName, operation: 'get' }),
      );
      throw error;
    }
  }
}

export class MemoryArtifactStore implements IArtifactStore {
  private readonly files = new Map<string, Buffer>();

  async put(namespace: string, key: string, data: Buffer, mimeType: string): Promise<StoredArtifact> {
    const id = `${namespace}/${key}`;
    this.files.set(id, Buffer.from(data));
    return { id, uri: `memory://${id}`, mimeType, byteLength: data.length };
  }

  async get(artifactId: string): Promise<Buffer> {
    const data = this.files.get(artifactId);
    if (!data) {
      throw new Error(`Artifact not found: ${artifactId}`);
    }
    return Buffer.from(data);
  }

  has(artifactId: string): boolean {
    return this.files.has(artifactId);
  }

  keys(): string[] {
    return [...this.files.keys()];
  }
}
