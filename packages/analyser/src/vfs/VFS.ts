import { Result } from "@oapi-tf/core/result";

export type VFSError =
  | { type: "notFound"; path: string }
  | { type: "permissionDenied"; path: string }
  | { type: "unknown"; path: string; message: string };

export type ReadFileResult = Result<string, VFSError>;

export interface VFS {
  readFile(path: string): Promise<ReadFileResult>;
}

export function formatVFSError(error: VFSError): string {
  switch (error.type) {
    case "notFound":
      return `file '${error.path}' not found`;
    case "permissionDenied":
      return `permission denied reading '${error.path}'`;
    case "unknown":
      return `failed to read '${error.path}': ${error.message}`;
  }
}
