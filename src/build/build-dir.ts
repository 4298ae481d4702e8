import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export const BUILD_DIR_PREFIX = "lambda-publish-";

/**
 * Run `fn` with a private temporary directory that is removed once `fn`
 * settles, whether it returns, throws or is cancelled.
 */
export async function withBuildDir<T>(
  fn: (dir: string) => Promise<T>,
  opts: { tmpRoot?: string } = {},
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(opts.tmpRoot ?? os.tmpdir(), BUILD_DIR_PREFIX));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
