import { beforeEach, describe, it, expect, vi } from "vitest";
import { MemoryVFS } from "../src/vfs/MemoryVFS.js";
import { NodeVFS } from "../src/vfs/NodeVFS.js";
import { formatVFSError } from "../src/vfs/VFS.js";

const { readFile } = vi.hoisted(() => ({ readFile: vi.fn() }));

vi.mock("node:fs/promises", () => ({ readFile }));

const failure = (message: string, code?: string): Error =>
  Object.assign(new Error(message), code === undefined ? {} : { code });

describe("NodeVFS", () => {
  beforeEach(() => {
    readFile.mockReset();
  });

  it("should read files as utf-8", async () => {
    readFile.mockResolvedValueOnce("swagger: '2.0'");
    const result = await new NodeVFS().readFile("/specs/api.yaml");
    expect(result).toEqual({ success: true, data: "swagger: '2.0'" });
    expect(readFile).toHaveBeenCalledWith("/specs/api.yaml", "utf-8");
  });

  it.each([
    ["ENOENT", { type: "notFound", path: "/specs/api.yaml" }],
    ["EACCES", { type: "permissionDenied", path: "/specs/api.yaml" }],
    ["EPERM", { type: "permissionDenied", path: "/specs/api.yaml" }],
  ])("should map %s", async (code, expected) => {
    readFile.mockRejectedValueOnce(failure("read failed", code));
    const result = await new NodeVFS().readFile("/specs/api.yaml");
    expect(result).toEqual({ success: false, error: expected });
  });

  it("should keep the message of other errors", async () => {
    readFile.mockRejectedValueOnce(failure("is a directory", "EISDIR"));
    const result = await new NodeVFS().readFile("/specs");
    expect(result).toEqual({
      success: false,
      error: { type: "unknown", path: "/specs", message: "is a directory" },
    });
    if (!result.success) {
      expect(formatVFSError(result.error)).toBe(
        "failed to read '/specs': is a directory"
      );
    }
  });
});

describe("MemoryVFS", () => {
  it("should serve the files it was given", async () => {
    const vfs = new MemoryVFS(new Map([["/a.yaml", "a: 1"]]));
    expect(await vfs.readFile("/a.yaml")).toEqual({ success: true, data: "a: 1" });
    expect(await vfs.readFile("/b.yaml")).toEqual({
      success: false,
      error: { type: "notFound", path: "/b.yaml" },
    });
  });
});
