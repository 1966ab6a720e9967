import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export interface UploadStore {
  save(data: Buffer, originalName: string): Promise<string>;
  remove(filePath: string): Promise<void>;
}

/** Uploads land in the OS temp dir under a random name that keeps the extension. */
export function tempUploadStore(dir: string = os.tmpdir()): UploadStore {
  return {
    async save(data, originalName) {
      const suffix = path.extname(originalName);
      const filePath = path.join(dir, `upload-${crypto.randomUUID()}${suffix}`);
      await fs.writeFile(filePath, data);
      return filePath;
    },
    async remove(filePath) {
      await fs.rm(filePath, { force: true });
    },
  };
}
