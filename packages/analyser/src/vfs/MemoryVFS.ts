import { ok, err } from "@oapi-tf/core/result";
import { VFS, ReadFileResult } from "./VFS.js";

export class MemoryVFS implements VFS {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string> | Map<string, string>) {
    this.files = files instanceof Map ? files : new Map(Object.entries(files));
  }

  async readFile(path: string): Promise<ReadFileResult> {
    const content = this.files.get(path);
    if (content === undefined) {
      return err({ type: "notFound", path });
    }
    return ok(content);
  }
}
