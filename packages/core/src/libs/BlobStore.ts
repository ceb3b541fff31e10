import { hashBytes } from "./Crypto";

/**
 * Content-addressable blob storage. The ledger keeps only the returned id
 * and never looks inside a blob.
 */
export interface BlobStore {
  put(bytes: Uint8Array, contentType: string): Promise<string>;
  get(blobId: string): Promise<Uint8Array>;
}

export interface HttpBlobStoreConfig {
  /** Accepts PUT /v1/blobs */
  publisherUrl: string;
  /** Serves GET /v1/blobs/:blobId */
  aggregatorUrl: string;
  /** Storage epochs requested per upload */
  epochs?: number;
}

interface PublisherResponse {
  newlyCreated?: { blobObject?: { blobId?: string } };
  alreadyCertified?: { blobId?: string };
}

/**
 * Blob store backed by an HTTP publisher/aggregator pair.
 */
export class HttpBlobStore implements BlobStore {
  private readonly epochs: number;

  constructor(private readonly config: HttpBlobStoreConfig) {
    this.epochs = config.epochs ?? 5;
  }

  async put(bytes: Uint8Array, contentType: string): Promise<string> {
    const res = await fetch(`${this.config.publisherUrl}/v1/blobs?epochs=${this.epochs}`, {
      method: "PUT",
      headers: { "Content-Type": contentType },
      body: bytes,
    });
    if (!res.ok) {
      throw new Error(`Blob upload failed: HTTP ${res.status}`);
    }
    const body = (await res.json()) as PublisherResponse;
    const blobId = body.newlyCreated?.blobObject?.blobId ?? body.alreadyCertified?.blobId;
    if (!blobId) {
      throw new Error("Blob upload response did not include a blob id");
    }
    return blobId;
  }

  async get(blobId: string): Promise<Uint8Array> {
    const res = await fetch(this.getDownloadUrl(blobId));
    if (!res.ok) {
      throw new Error(`Blob download failed: HTTP ${res.status}`);
    }
    return new Uint8Array(await res.arrayBuffer());
  }

  getDownloadUrl(blobId: string): string {
    return `${this.config.aggregatorUrl}/v1/blobs/${encodeURIComponent(blobId)}`;
  }
}

/**
 * In-process blob store. Ids are the keccak256 of the content, so storing
 * the same bytes twice yields the same id.
 */
export class MemoryBlobStore implements BlobStore {
  private blobs = new Map<string, { bytes: Uint8Array; contentType: string }>();

  async put(bytes: Uint8Array, contentType: string): Promise<string> {
    const blobId = hashBytes(bytes);
    this.blobs.set(blobId, { bytes: new Uint8Array(bytes), contentType });
    return blobId;
  }

  async get(blobId: string): Promise<Uint8Array> {
    const blob = this.blobs.get(blobId);
    if (!blob) {
      throw new Error(`Blob not found: ${blobId}`);
    }
    return new Uint8Array(blob.bytes);
  }

  getContentType(blobId: string): string | undefined {
    return this.blobs.get(blobId)?.contentType;
  }

  size(): number {
    return this.blobs.size;
  }
}
