/**
 * @file src/lib/fileStorage.ts
 * @description
 * Disk-backed file storage for payment proofs and seller vouchers.
 */

import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { FileStorage } from "./store";

export class DiskFileStorage implements FileStorage {
  /**
   * @param rootDir - Directory files are written under
   * @param publicPrefix - URL prefix the directory is served from
   */
  constructor(
    private readonly rootDir: string,
    private readonly publicPrefix = "/static/receipts"
  ) {}

  private diskPath(folder: string, name: string): string {
    if ([folder, name].some((seg) => !seg || seg.includes("..") || /[\\/]/.test(seg))) {
      throw new Error(`Invalid storage path segment: ${folder}/${name}`);
    }
    return path.join(this.rootDir, folder, name);
  }

  async save(folder: string, name: string, data: Uint8Array): Promise<string> {
    const file = this.diskPath(folder, name);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, data);
    return `${this.publicPrefix}/${folder}/${name}`;
  }

  async remove(ref: string): Promise<void> {
    const prefix = `${this.publicPrefix}/`;
    const parts = ref.startsWith(prefix) ? ref.slice(prefix.length).split("/") : [];
    if (parts.length !== 2) throw new Error(`Not a stored file: ${ref}`);
    const [folder, name] = parts;
    await rm(this.diskPath(folder, name), { force: true });
  }
}
