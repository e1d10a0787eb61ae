/**
 * @fileoverview External blob storage for archived history blobs.
 *
 * Archived blobs live under keys of the form
 * `{repository}/{firstCommitId}/{filename}`, where the commit is the one that
 * introduced the content, so re-running an archive writes the same bytes to
 * the same key. Uploads are streamed and split into parts by the SDK.
 *
 * @module storage/blob-store
 *
 * @example
 * ```typescript
 * const store = new S3BlobStore({ bucket: 'git-large-file-archive' })
 * const key = archiveKey('api', 'e83c5163316f89bfbde7d9ab23ca2e25604af290', 'assets/video.mp4')
 * await store.put(key, fs.createReadStream('assets/video.mp4'))
 * storageLocation('git-large-file-archive', key) // 's3://git-large-file-archive/api/e83c…/video.mp4'
 * ```
 */

import { ListObjectsV2Command, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3'
import { Upload } from '@aws-sdk/lib-storage'
import * as path from 'path'
import type { Readable } from 'stream'

// ============================================================================
// Types
// ============================================================================

/**
 * Minimal object storage used by the archiver.
 */
export interface BlobStore {
  /** Bucket (or namespace) the keys live in */
  readonly bucket: string
  /** Store the streamed `body` under `key`, replacing any existing object */
  put(key: string, body: Readable): Promise<void>
  /** Keys starting with `prefix`, for manual audit */
  list(prefix?: string): Promise<string[]>
}

// ============================================================================
// Keys
// ============================================================================

/**
 * Derive the storage key of an archived blob.
 *
 * Only the file's base name is used, matching the layout operators browse
 * with `aws s3 ls`. Passing `objectId` adds it as an extra segment, for blobs
 * whose plain key is already taken by different content.
 */
export function archiveKey(repository: string, firstCommitId: string, filePath: string, objectId?: string): string {
  const name = path.posix.basename(filePath)
  return objectId === undefined
    ? `${repository}/${firstCommitId}/${name}`
    : `${repository}/${firstCommitId}/${objectId}/${name}`
}

/**
 * Full `s3://` location of a key.
 */
export function storageLocation(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`
}

// ============================================================================
// S3 implementation
// ============================================================================

/**
 * Options for {@link S3BlobStore}.
 */
export interface S3BlobStoreOptions {
  bucket: string
  /** Custom endpoint for S3-compatible services */
  endpoint?: string
  /** Region; the SDK's default resolution applies when omitted */
  region?: string
  /** Pre-built client, mostly for tests */
  client?: S3Client
}

/**
 * {@link BlobStore} backed by Amazon S3 or any S3-compatible service.
 * Credentials come from the standard AWS provider chain.
 */
export class S3BlobStore implements BlobStore {
  readonly bucket: string
  private readonly client: S3Client

  constructor(options: S3BlobStoreOptions) {
    this.bucket = options.bucket
    if (options.client) {
      this.client = options.client
    } else {
      const config: S3ClientConfig = {}
      if (options.region) config.region = options.region
      if (options.endpoint) {
        config.endpoint = options.endpoint
        config.forcePathStyle = true
      }
      this.client = new S3Client(config)
    }
  }

  async put(key: string, body: Readable): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: { Bucket: this.bucket, Key: key, Body: body },
    })
    await upload.done()
  }

  async list(prefix?: string): Promise<string[]> {
    const keys: string[] = []
    let continuationToken: string | undefined

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          ...(prefix !== undefined && { Prefix: prefix }),
          ...(continuationToken !== undefined && { ContinuationToken: continuationToken }),
        })
      )
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key)
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined
    } while (continuationToken)

    return keys
  }
}
