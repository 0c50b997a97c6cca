export interface StoredObject {
  body: Uint8Array;
  contentType?: string | undefined;
}

/** Durable blob storage for raw documents. */
export interface ObjectStore {
  putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    contentType?: string
  ): Promise<void>;

  /** Rejects with NotFoundError when the key does not exist. */
  getObject(bucket: string, key: string): Promise<StoredObject>;
}
