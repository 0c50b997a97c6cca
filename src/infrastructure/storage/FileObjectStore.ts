/**
 * Object store on the local filesystem: `<root>/<bucket>/<key>`.
 * Content types are kept beside the data under `<root>/.meta/<bucket>/<key>.json`.
 */
import type { ObjectStore, StoredObject } from "@domain/storage/ports";
import { NotFoundError, ValidationError } from "@typesLocal/AppError";
import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";

function isMissingFile(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class FileObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    contentType?: string
  ): Promise<void> {
    const file = this.resolve(bucket, key);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, body);

    const meta = this.resolve(path.join(".meta", bucket), `${key}.json`);
    await mkdir(path.dirname(meta), { recursive: true });
    await writeFile(meta, JSON.stringify({ contentType: contentType ?? null }), "utf-8");
  }

  async getObject(bucket: string, key: string): Promise<StoredObject> {
    let body: Buffer;
    try {
      body = await readFile(this.resolve(bucket, key));
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Object not found: ${bucket}/${key}`, { bucket, key });
      }
      throw error;
    }

    return {
      body: new Uint8Array(body),
      contentType: await this.readContentType(bucket, key),
    };
  }

  private async readContentType(bucket: string, key: string): Promise<string | undefined> {
    try {
      const raw = await readFile(this.resolve(path.join(".meta", bucket), `${key}.json`), "utf-8");
      const parsed: unknown = JSON.parse(raw);
      if (
        parsed !== null &&
        typeof parsed === "object" &&
        "contentType" in parsed &&
        typeof parsed.contentType === "string"
      ) {
        return parsed.contentType;
      }
      return undefined;
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private resolve(bucket: string, key: string): string {
    const base = path.resolve(this.root, bucket);
    const file = path.resolve(base, key);
    if (!file.startsWith(base + path.sep)) {
      throw new ValidationError(`Object key escapes its bucket: ${key}`, { bucket, key });
    }
    return file;
  }
}
