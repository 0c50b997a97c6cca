import type { ObjectStore, StoredObject } from "@domain/storage/ports";
import { NotFoundError } from "@typesLocal/AppError";

export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, StoredObject>();

  async putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    contentType?: string
  ): Promise<void> {
    this.objects.set(`${bucket}/${key}`, { body: body.slice(), contentType });
  }

  async getObject(bucket: string, key: string): Promise<StoredObject> {
    const stored = this.objects.get(`${bucket}/${key}`);
    if (!stored) {
      throw new NotFoundError(`Object not found: ${bucket}/${key}`, { bucket, key });
    }
    return { body: stored.body.slice(), contentType: stored.contentType };
  }
}
