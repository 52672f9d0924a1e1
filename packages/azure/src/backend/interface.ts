/**
 * Blob-store client port.
 * One instance addresses exactly one container and is owned by one
 * datastore. Implementations throw the backend's own errors; translation
 * into datastore errors happens in ../errors/translate.ts.
 */

export interface BlobRequestOptions {
  signal?: AbortSignal;
}

export interface BlobProperties {
  contentLength: number;
}

export interface BlobItem {
  name: string;
  /** -1 when the listing did not include a length. */
  contentLength: number;
}

export interface ListBlobsOptions extends BlobRequestOptions {
  prefix?: string;
  /** Opaque continuation marker from the previous page. */
  marker?: string;
  pageSize?: number;
}

export interface BlobListSegment {
  items: BlobItem[];
  /** Absent once the listing is exhausted. */
  nextMarker?: string;
}

export interface BlobContainer {
  readonly name: string;

  /**
   * Create the container.
   * @throws the backend's ContainerAlreadyExists error when it exists
   */
  create(options?: BlobRequestOptions): Promise<void>;

  /** Single-shot upload of the full content, replacing any existing blob. */
  upload(
    blobName: string,
    data: Uint8Array,
    options?: BlobRequestOptions,
  ): Promise<void>;

  /** Full blob body, buffered in memory. */
  download(blobName: string, options?: BlobRequestOptions): Promise<Uint8Array>;

  /** Metadata only; never transfers content. */
  getProperties(
    blobName: string,
    options?: BlobRequestOptions,
  ): Promise<BlobProperties>;

  /** Delete the blob together with its snapshots. */
  delete(blobName: string, options?: BlobRequestOptions): Promise<void>;

  /** One page of a flat listing. */
  listBlobs(options?: ListBlobsOptions): Promise<BlobListSegment>;
}
