import { mkdir, open, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

/**
 * Replace `target` with `payload`. The bytes go to a hidden sibling first and
 * are fsynced before the rename, so readers see the old or the new file.
 */
export async function atomicWriteFile(target: string, payload: string): Promise<void> {
  const dir = dirname(target);
  await mkdir(dir, { recursive: true });
  const staging = join(dir, `.${basename(target)}.${process.pid}.tmp`);

  try {
    const fh = await open(staging, "w");
    try {
      await fh.writeFile(payload, "utf8");
      await fh.sync();
    } finally {
      await fh.close();
    }
    await rename(staging, target);
  } catch (err) {
    await rm(staging, { force: true });
    throw err;
  }
}
