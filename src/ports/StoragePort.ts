export type StorageReadOptions = {
  writeIfMissing?: boolean;
};

export interface StoragePort {
  readJson(path: string, fallback: unknown, options?: StorageReadOptions): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
}
