/**
 * Ephemeral download storage.
 *
 * Every fetch downloads into its own directory under <data_dir>/downloads,
 * named after the request message and the post it relays:
 *
 *   downloads/<request id>-<channel>-<post id>/<file name>
 *
 * Fetches running side by side in one /bdl window never share a directory,
 * and a fetch only ever removes its own.
 */

import fs from "node:fs";
import path from "node:path";
import type { PostReference } from "./links.js";

function dirName(requestMessageId: number, ref: PostReference): string {
  return `${requestMessageId}-${String(ref.channel).replace(/[^\w-]/g, "_")}-${ref.messageId}`;
}

/**
 * Create the directory one fetch downloads into and return its path.
 * Synchronous, so no other fetch can remove the downloads root between the
 * two mkdir calls.
 */
export function createFetchDir(downloadsDir: string, requestMessageId: number, ref: PostReference): string {
  fs.mkdirSync(downloadsDir, { recursive: true });
  const dir = path.join(downloadsDir, dirName(requestMessageId, ref));
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Delete a fetch directory with everything in it. Already gone is a no-op.
 */
export async function removeFetchDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/**
 * Delete a file the downloader wrote somewhere other than the path it was
 * given. Files inside `dir` go with the directory.
 */
export async function removeStrayArtifact(dir: string, filePath: string): Promise<void> {
  const relative = path.relative(dir, filePath);
  if (!relative.startsWith("..") && !path.isAbsolute(relative)) return;
  await fs.promises.rm(filePath, { force: true });
}
