import fs from "fs-extra";
import path from "path";

/**
 * Replace `filePath` with `contents` so readers see either the old file or
 * the new one, never a partial write. The temp file lives in the same
 * directory so the rename stays on one filesystem. An existing file's mode
 * is carried over (tunnel configs are usually 0600).
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  await fs.ensureDir(dir);

  const mode = (await fs.pathExists(filePath))
    ? (await fs.stat(filePath)).mode & 0o777
    : undefined;

  try {
    await fs.writeFile(tmpPath, contents, mode !== undefined ? { mode } : {});
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.remove(tmpPath);
    throw error;
  }
}
