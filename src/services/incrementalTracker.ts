import { snapshotFiles } from "./fileSnapshot";

/**
 * Remembers the content hash of every file a check last passed on, so the
 * next run only needs to look at files that changed since.
 */
export class IncrementalTracker {
  private readonly passedHashes = new Map<string, Map<string, string>>();

  constructor(private readonly root: string) {}

  async pendingFiles(checkId: string, files: readonly string[]): Promise<string[]> {
    const known = this.passedHashes.get(checkId);
    if (!known || files.length === 0) {
      return [...files];
    }
    const snapshots = await snapshotFiles(files, this.root);
    return files.filter((file) => {
      const snapshot = snapshots.get(file);
      return !snapshot?.exists || known.get(file) !== snapshot.contentHash;
    });
  }

  async markPassed(checkId: string, files: readonly string[]): Promise<void> {
    const snapshots = await snapshotFiles(files, this.root);
    const known = this.passedHashes.get(checkId) ?? new Map<string, string>();
    for (const snapshot of snapshots.values()) {
      if (snapshot.exists) {
        known.set(snapshot.path, snapshot.contentHash);
      }
    }
    this.passedHashes.set(checkId, known);
  }

  forget(checkId: string, files: readonly string[]): void {
    const known = this.passedHashes.get(checkId);
    if (!known) return;
    for (const file of files) {
      known.delete(file);
    }
  }
}
