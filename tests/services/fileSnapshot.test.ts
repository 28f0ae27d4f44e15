import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  changedPaths,
  contentChanged,
  isGenuineModification,
  snapshotFile,
  snapshotFiles
} from "../../src/services/fileSnapshot";
import { createTempDir } from "../helpers";

describe("fileSnapshot", () => {
  it("marks missing files as absent", async () => {
    const root = await createTempDir();
    const snapshot = await snapshotFile("nope.ts", root);
    expect(snapshot).toEqual({ path: "nope.ts", exists: false, contentHash: "", mtimeMs: 0 });
  });

  it("detects content changes but not rewrites of identical bytes", async () => {
    const root = await createTempDir();
    const file = path.join(root, "a.ts");
    await fs.writeFile(file, "one\n");
    const before = await snapshotFiles(["a.ts", "a.ts"], root);
    expect(before.size).toBe(1);

    await fs.writeFile(file, "one\n");
    expect(changedPaths(before, await snapshotFiles(["a.ts"], root))).toEqual([]);

    await fs.writeFile(file, "two\n");
    expect(changedPaths(before, await snapshotFiles(["a.ts"], root))).toEqual(["a.ts"]);
  });

  it("rejects a change whose timestamp went backwards", () => {
    const before = { path: "a.ts", exists: true, contentHash: "h1", mtimeMs: 2_000 };
    const rewound = { path: "a.ts", exists: true, contentHash: "h2", mtimeMs: 1_000 };
    const forward = { path: "a.ts", exists: true, contentHash: "h2", mtimeMs: 3_000 };
    const deleted = { path: "a.ts", exists: false, contentHash: "", mtimeMs: 0 };

    expect(contentChanged(before, rewound)).toBe(true);
    expect(isGenuineModification(before, rewound)).toBe(false);
    expect(isGenuineModification(before, forward)).toBe(true);
    expect(isGenuineModification(before, deleted)).toBe(true);
    expect(isGenuineModification(before, { ...before })).toBe(false);
  });
});
