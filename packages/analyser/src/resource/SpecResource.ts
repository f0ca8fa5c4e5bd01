import { ok } from "@oapi-tf/core/result";
import { Swagger } from "@oapi-tf/core/swagger";
import { AnalysisResult, fail } from "../errors.js";
import { ResponsesPolling } from "../analysis/polling.js";
import { Duration, ResourceTimeouts } from "../analysis/timeouts.js";
import {
  ParentResourceInfo,
  getResourcePath,
} from "../naming/ResourceNaming.js";
import { BackendConfiguration } from "./BackendConfiguration.js";
import { SchemaDefinition } from "./SchemaDefinition.js";

export interface ResourceOperation {
  readonly operation: Swagger.Operation;
  readonly responses: ResponsesPolling;
  readonly timeout?: Duration;
}

export interface ResourceOperations {
  readonly post: ResourceOperation;
  readonly get: ResourceOperation;
  readonly put?: ResourceOperation;
  readonly delete?: ResourceOperation;
}

export interface SpecResourceInit {
  name: string;
  rootPath: string;
  instancePath: string;
  schema: SchemaDefinition;
  operations: ResourceOperations;
  timeouts: ResourceTimeouts;
  parentInfo?: ParentResourceInfo;
  /** Override host, region already substituted */
  host?: string;
  region?: string;
  regions?: readonly string[];
}

/**
 * A terraform compliant resource found in the document.
 */
export class SpecResource {
  readonly name: string;
  readonly rootPath: string;
  readonly instancePath: string;
  readonly schema: SchemaDefinition;
  readonly operations: ResourceOperations;
  readonly timeouts: ResourceTimeouts;
  readonly parentResourceNames: readonly string[];
  readonly fullParentResourceName: string;
  readonly host?: string;
  readonly region?: string;
  readonly regions: readonly string[];

  constructor(init: SpecResourceInit) {
    this.name = init.name;
    this.rootPath = init.rootPath;
    this.instancePath = init.instancePath;
    this.schema = init.schema;
    this.operations = Object.freeze({ ...init.operations });
    this.timeouts = Object.freeze({ ...init.timeouts });
    this.parentResourceNames = Object.freeze([
      ...(init.parentInfo?.parentResourceNames ?? []),
    ]);
    this.fullParentResourceName = init.parentInfo?.fullParentResourceName ?? "";
    this.host = init.host;
    this.region = init.region;
    this.regions = Object.freeze([...(init.regions ?? [])]);
    Object.freeze(this);
  }

  get isSubResource(): boolean {
    return this.parentResourceNames.length > 0;
  }

  get isMultiRegion(): boolean {
    return this.region !== undefined;
  }

  immutablePropertyNames(): string[] {
    return this.schema.immutablePropertyNames();
  }

  getResourcePath(parentIds: readonly string[] = []): AnalysisResult<string> {
    return getResourcePath(this.rootPath, parentIds);
  }

  /**
   * Collection URL: `<scheme>://<host><basePath><path>`. The resource's
   * override host wins over the document host.
   */
  getResourceURL(
    backend: BackendConfiguration,
    parentIds: readonly string[] = [],
    region?: string
  ): AnalysisResult<string> {
    const host =
      this.host === undefined ? backend.getHost(region) : ok(this.host);
    if (!host.success) return host;
    if (host.data === "") {
      return fail("invalidHost", "host can not be empty");
    }

    const path = this.getResourcePath(parentIds);
    if (!path.success) return path;
    if (path.data === "") {
      return fail("invalidResourcePath", "resource path can not be empty");
    }

    const basePath = normalizeBasePath(backend.basePath);
    const resourcePath = path.data.startsWith("/")
      ? path.data
      : `/${path.data}`;
    return ok(`${backend.defaultScheme}://${host.data}${basePath}${resourcePath}`);
  }

  getResourceInstanceURL(
    backend: BackendConfiguration,
    parentIds: readonly string[],
    id: string,
    region?: string
  ): AnalysisResult<string> {
    const url = this.getResourceURL(backend, parentIds, region);
    if (!url.success) return url;
    return ok(`${url.data.replace(/\/+$/, "")}/${id}`);
  }
}

/**
 * `""` and `"/"` are dropped, a missing leading slash is added.
 */
export function normalizeBasePath(basePath: string): string {
  const trimmed = basePath.replace(/\/+$/, "");
  if (trimmed === "") return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}
