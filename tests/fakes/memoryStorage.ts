import type { StoragePort, StorageReadOptions } from '../../src/ports/StoragePort';

export class MemoryStorage implements StoragePort {
  public readonly files = new Map<string, unknown>();
  public writes = 0;

  public async readJson(path: string, fallback: unknown, options?: StorageReadOptions): Promise<unknown> {
    if (!this.files.has(path)) {
      if (options?.writeIfMissing) {
        await this.writeJson(path, fallback);
      }
      return fallback;
    }
    return this.files.get(path);
  }

  public async writeJson(path: string, data: unknown): Promise<void> {
    this.writes += 1;
    this.files.set(path, JSON.parse(JSON.stringify(data)));
  }
}
