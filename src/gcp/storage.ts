import { Storage } from "@google-cloud/storage";
import { ObjectStoreError, errorMessage, type ObjectStoreFailure } from "../errors.js";

export type StorageObjectRef = {
  readonly bucketId: string;
  readonly name: string;
};

export interface ObjectStore {
  list(bucketId: string, prefix: string): Promise<StorageObjectRef[]>;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "number" ? code : undefined;
}

export function classifyStorageError(err: unknown): ObjectStoreFailure {
  const status = statusOf(err);
  if (status === 404) return "NOT_FOUND";
  if (status === 401 || status === 403) return "PERMISSION_DENIED";
  if (/default credentials/i.test(errorMessage(err))) return "PERMISSION_DENIED";
  return "UNAVAILABLE";
}

export class GcsObjectStore implements ObjectStore {
  private readonly storage: Storage;

  constructor(projectId?: string) {
    this.storage = new Storage({ projectId });
  }

  async list(bucketId: string, prefix: string): Promise<StorageObjectRef[]> {
    try {
      // getFiles follows page tokens on its own (autoPaginate defaults to true)
      const [files] = await this.storage.bucket(bucketId).getFiles({ prefix });
      return files.map((f) => ({ bucketId, name: f.name }));
    } catch (e) {
      const reason = classifyStorageError(e);
      throw new ObjectStoreError(reason, bucketId, `Listing gs://${bucketId}/${prefix} failed (${reason}): ${errorMessage(e)}`, e);
    }
  }
}

export async function listObjects(bucketId: string, prefix: string, projectId?: string): Promise<StorageObjectRef[]> {
  return new GcsObjectStore(projectId).list(bucketId, prefix);
}
