/**
 * Storage Module
 *
 * Responsibilities:
 * - Implement the StorageAdapter interface over a local output directory
 * - Implement MemoryStorageAdapter for testing
 * - Persist rendered post sets (persistPosts)
 * - Track size, content type and checksum of each artifact
 *
 * Artifacts are addressed by plain file name; there are no subdirectories.
 */

import { createHash } from 'crypto';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import type { ArtifactMetadata, Logger, ModuleResult, ScrapedPost, StorageAdapter } from '../types/index.js';
import { createLogger, errorMessage } from '../logger/index.js';
import { renderPosts } from '../renderers/index.js';

export type { StorageAdapter };

const CONTENT_TYPES_BY_EXTENSION: Record<string, string> = {
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.txt': 'text/plain',
};

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

export function inferContentType(fileName: string): string {
  return CONTENT_TYPES_BY_EXTENSION[extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

function resolveContentType(fileName: string, metadata?: Record<string, unknown>): string {
  const declared = metadata?.contentType;
  return typeof declared === 'string' ? declared : inferContentType(fileName);
}

/**
 * Reject names that would escape the storage root
 */
export function assertPlainFileName(fileName: string): void {
  if (fileName.length === 0 || basename(fileName) !== fileName || fileName === '.' || fileName === '..') {
    throw new Error(`Invalid artifact file name: ${fileName}`);
  }
}

// ============================================================================
// Local File Storage
// ============================================================================

/**
 * Stores artifacts as files under one output directory, created on first write
 */
export class LocalFileStorageAdapter implements StorageAdapter {
  private readonly root: string;

  constructor(outputDir: string) {
    this.root = resolve(outputDir);
  }

  /**
   * Absolute path of an artifact inside the output directory
   */
  pathFor(fileName: string): string {
    assertPlainFileName(fileName);
    return join(this.root, fileName);
  }

  async save(fileName: string, content: string | Buffer, metadata?: Record<string, unknown>): Promise<ArtifactMetadata> {
    const path = this.pathFor(fileName);
    await mkdir(this.root, { recursive: true });
    await writeFile(path, content);

    return {
      fileName,
      createdAt: new Date().toISOString(),
      contentType: resolveContentType(fileName, metadata),
      size: getContentSize(content),
      checksum: calculateChecksum(content),
    };
  }

  /**
   * @throws Error if the artifact does not exist
   */
  async load(fileName: string): Promise<{ content: Buffer; metadata: ArtifactMetadata }> {
    const path = this.pathFor(fileName);
    if (!(await this.exists(fileName))) {
      throw new Error(`Artifact not found: ${fileName}`);
    }

    const [content, info] = await Promise.all([readFile(path), stat(path)]);
    return {
      content,
      metadata: {
        fileName,
        createdAt: info.mtime.toISOString(),
        contentType: inferContentType(fileName),
        size: info.size,
        checksum: calculateChecksum(content),
      },
    };
  }

  async exists(fileName: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(fileName));
      return info.isFile();
    } catch {
      return false;
    }
  }

  async list(): Promise<ArtifactMetadata[]> {
    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch {
      return [];
    }

    const artifacts: ArtifactMetadata[] = [];
    for (const fileName of entries.sort()) {
      const info = await stat(join(this.root, fileName));
      if (info.isFile()) {
        artifacts.push({
          fileName,
          createdAt: info.mtime.toISOString(),
          contentType: inferContentType(fileName),
          size: info.size,
        });
      }
    }
    return artifacts;
  }

  async delete(fileName: string): Promise<void> {
    await rm(this.pathFor(fileName), { force: true });
  }
}

// ============================================================================
// Memory Storage
// ============================================================================

/**
 * In-memory storage adapter for testing
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string | Buffer; metadata: ArtifactMetadata }> = new Map();

  async save(fileName: string, content: string | Buffer, metadata?: Record<string, unknown>): Promise<ArtifactMetadata> {
    assertPlainFileName(fileName);
    const artifactMetadata: ArtifactMetadata = {
      fileName,
      createdAt: new Date().toISOString(),
      contentType: resolveContentType(fileName, metadata),
      size: getContentSize(content),
      checksum: calculateChecksum(content),
    };

    this.store.set(fileName, { content, metadata: artifactMetadata });
    return artifactMetadata;
  }

  async load(fileName: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(fileName);
    if (!item) {
      throw new Error(`Artifact not found: ${fileName}`);
    }
    return item;
  }

  async exists(fileName: string): Promise<boolean> {
    return this.store.has(fileName);
  }

  async list(): Promise<ArtifactMetadata[]> {
    return Array.from(this.store.values(), (item) => item.metadata);
  }

  async delete(fileName: string): Promise<void> {
    this.store.delete(fileName);
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

// ============================================================================
// Persistence
// ============================================================================

/**
 * Render and store a post set as `<baseName>.<ext>`
 *
 * @returns the stored artifact, null data for an empty post set, or a
 *          failure result for an unknown format or a write error
 */
export async function persistPosts(
  posts: readonly ScrapedPost[],
  format: string,
  baseName: string,
  storage: StorageAdapter,
  logger: Logger = createLogger('storage')
): Promise<ModuleResult<ArtifactMetadata | null>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const metadata = { module: 'storage', timestamp };

  if (posts.length === 0) {
    logger.warn('No posts to save');
    return { success: true, data: null, metadata: { ...metadata, duration: Date.now() - startTime } };
  }

  const rendered = renderPosts(posts, format);
  if (!rendered.success || !rendered.data) {
    logger.error('Error rendering posts', { format, error: rendered.error?.message });
    return {
      success: false,
      error: rendered.error ?? { code: 'RENDER_ERROR', message: `Could not render ${format}` },
      metadata: { ...metadata, duration: Date.now() - startTime },
    };
  }

  const fileName = `${baseName}.${rendered.data.extension}`;

  try {
    const artifact = await storage.save(fileName, rendered.data.content, {
      contentType: rendered.data.contentType,
    });
    logger.info(`Data saved to ${fileName}`, { size: artifact.size });
    return { success: true, data: artifact, metadata: { ...metadata, duration: Date.now() - startTime } };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Error saving to ${format.toUpperCase()}`, { fileName, error: message });
    return {
      success: false,
      error: { code: 'PERSIST_ERROR', message, details: { fileName } },
      metadata: { ...metadata, duration: Date.now() - startTime },
    };
  }
}
