import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

export interface FileSnapshot {
  path: string;
  exists: boolean;
  contentHash: string;
  mtimeMs: number;
}

const hashContent = (content: Buffer): string => createHash("sha256").update(content).digest("hex");

export const snapshotFile = async (filePath: string, root: string): Promise<FileSnapshot> => {
  const absolute = path.resolve(root, filePath);
  try {
    const [content, stat] = await Promise.all([fs.readFile(absolute), fs.stat(absolute)]);
    return { path: filePath, exists: true, contentHash: hashContent(content), mtimeMs: stat.mtimeMs };
  } catch {
    return { path: filePath, exists: false, contentHash: "", mtimeMs: 0 };
  }
};

export const snapshotFiles = async (filePaths: readonly string[], root: string): Promise<Map<string, FileSnapshot>> => {
  const unique = [...new Set(filePaths)];
  const snapshots = await Promise.all(unique.map((filePath) => snapshotFile(filePath, root)));
  return new Map(snapshots.map((snapshot) => [snapshot.path, snapshot]));
};

export const contentChanged = (before: FileSnapshot, after: FileSnapshot): boolean =>
  before.exists !== after.exists || before.contentHash !== after.contentHash;

/**
 * A modification is only believed when the bytes differ and the file was not
 * rewound to an older timestamp.
 */
export const isGenuineModification = (before: FileSnapshot, after: FileSnapshot): boolean =>
  contentChanged(before, after) && (!after.exists || after.mtimeMs >= before.mtimeMs);

export const changedPaths = (before: Map<string, FileSnapshot>, after: Map<string, FileSnapshot>): string[] =>
  [...before.values()]
    .filter((snapshot) => {
      const next = after.get(snapshot.path);
      return next !== undefined && contentChanged(snapshot, next);
    })
    .map((snapshot) => snapshot.path);
