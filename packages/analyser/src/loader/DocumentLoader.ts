import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parse } from "yaml";
import { Result, ok, err } from "@oapi-tf/core/result";
import { ConsoleLogger, Logger } from "@oapi-tf/core/logging";
import {
  ServiceConfiguration,
  formatServiceConfigurationError,
  getServiceConfig,
} from "@oapi-tf/core/configuration";
import { Swagger, isRecord } from "@oapi-tf/core/swagger";
import { VFS, VFSError, formatVFSError } from "../vfs/VFS.js";

export type LoadError =
  | { type: "read"; error: VFSError }
  | { type: "parse"; source: string; message: string }
  | { type: "unsupportedVersion"; source: string; version: string }
  | { type: "invalidDocument"; source: string; message: string }
  | { type: "configuration"; message: string };

export type LoadResult = Result<Swagger.Document, LoadError>;

function parseText(text: string): Result<unknown, string> {
  try {
    // JSON is YAML, but pretty printed JSON may be indented with tabs
    if (text.trimStart().startsWith("{")) {
      return ok(JSON.parse(text));
    }
    return ok(parse(text));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Validates each entry of the `paths` object on its own. Vendor extensions
 * are skipped; an invalid path item is logged and dropped.
 */
function parsePaths(
  paths: Record<string, unknown>,
  source: string,
  logger: Logger
): Record<string, Swagger.PathItem> {
  const items: Record<string, Swagger.PathItem> = {};
  for (const [path, value] of Object.entries(paths)) {
    if (path.startsWith("x-")) continue;
    const item = Swagger.PathItem.safeParse(value);
    if (!item.success) {
      logger.warn(
        `ignoring path '${path}' of '${source}': ${z.prettifyError(item.error)}`
      );
      continue;
    }
    items[path] = item.data;
  }
  return items;
}

/**
 * Parses a Swagger 2.0 document from YAML or JSON text.
 */
export function parseSwaggerDocument(
  text: string,
  source = "<memory>",
  logger: Logger = new ConsoleLogger()
): LoadResult {
  const raw = parseText(text);
  if (!raw.success) {
    return err({ type: "parse", source, message: raw.error });
  }
  if (!isRecord(raw.data)) {
    return err({
      type: "invalidDocument",
      source,
      message: "the document root must be an object",
    });
  }

  // an unquoted `swagger: 2.0` reads as a number
  const declared = raw.data.swagger === 2 ? "2.0" : raw.data.swagger;
  if (declared !== "2.0") {
    const version = declared ?? raw.data.openapi;
    return err({
      type: "unsupportedVersion",
      source,
      version: version === undefined ? "unknown" : String(version),
    });
  }

  const paths = raw.data.paths;
  if (!isRecord(paths)) {
    return err({
      type: "invalidDocument",
      source,
      message: "the document must declare a 'paths' object",
    });
  }

  const document = Swagger.Document.safeParse({
    ...raw.data,
    swagger: "2.0",
    paths: {},
  });
  if (!document.success) {
    return err({
      type: "invalidDocument",
      source,
      message: z.prettifyError(document.error),
    });
  }
  return ok({ ...document.data, paths: parsePaths(paths, source, logger) });
}

export async function loadSwaggerDocument(
  vfs: VFS,
  path: string,
  logger?: Logger
): Promise<LoadResult> {
  const text = await vfs.readFile(path);
  if (!text.success) {
    return err({ type: "read", error: text.error });
  }
  return parseSwaggerDocument(text.data, path, logger);
}

/**
 * Loads the document of one service of the plugin configuration. Only local
 * paths and `file://` URLs are read; remote documents are fetched by the
 * caller and handed to `parseSwaggerDocument`.
 */
export async function loadServiceDocument(
  vfs: VFS,
  configuration: ServiceConfiguration,
  providerName: string,
  logger?: Logger
): Promise<LoadResult> {
  const service = getServiceConfig(configuration, providerName);
  if (!service.success) {
    return err({
      type: "configuration",
      message: formatServiceConfigurationError(service.error),
    });
  }

  const location = service.data["swagger-url"];
  if (/^https?:\/\//i.test(location)) {
    return err({
      type: "configuration",
      message: `service '${providerName}' points at the remote document '${location}'; remote documents must be retrieved by the caller`,
    });
  }
  const path = location.startsWith("file://")
    ? fileURLToPath(location)
    : location;
  return loadSwaggerDocument(vfs, path, logger);
}

export function formatLoadError(error: LoadError): string {
  switch (error.type) {
    case "read":
      return formatVFSError(error.error);
    case "parse":
      return `failed to parse '${error.source}': ${error.message}`;
    case "unsupportedVersion":
      return `'${error.source}' is not a Swagger 2.0 document (version: ${error.version})`;
    case "invalidDocument":
      return `'${error.source}' is not a valid Swagger 2.0 document: ${error.message}`;
    case "configuration":
      return error.message;
  }
}
