import { AnalysisResult, fail } from "../errors.js";
import { ok } from "@oapi-tf/core/result";

const VERSION_SEGMENT = /^v\d+$/;
const PARAM_SEGMENT = /^\{[^/{}]+\}$/;
const PATH_PARAM = /\{[^/{}]+\}/g;
const INSTANCE_PATH = /^(.*\/)\{[^/{}]+\}$/;

export const isVersionSegment = (segment: string | undefined): boolean =>
  segment !== undefined && VERSION_SEGMENT.test(segment);

export const isParamSegment = (segment: string | undefined): boolean =>
  segment !== undefined && PARAM_SEGMENT.test(segment);

const splitPath = (path: string): string[] =>
  path.split("/").filter((segment) => segment !== "");

/**
 * `/users/{id}`, `/a/b/{name}/c/{id}`: a path ending in a single
 * bracketed parameter segment.
 */
export const isResourceInstanceEndPoint = (path: string): boolean =>
  INSTANCE_PATH.test(path);

/**
 * The instance path with its trailing `{param}` removed, slash kept:
 * `/users/{id}` → `/users/`.
 */
export const getInstanceRootPrefix = (instancePath: string): string | undefined =>
  INSTANCE_PATH.exec(instancePath)?.[1];

/**
 * Local name of a resource from its root path. The last segment names the
 * resource; a version segment right before it becomes a `_vN` suffix.
 *
 * - `/v1/cdns/` → `cdns_v1`
 * - `/v1/cdns/{id}/v2/firewalls` → `firewalls_v2`
 * - `/v1/something/users` → `users`
 */
export function buildResourceName(rootPath: string): AnalysisResult<string> {
  const segments = splitPath(rootPath);
  const name = segments.at(-1);
  if (name === undefined) {
    return fail(
      "invalidResourcePath",
      `could not build the resource name: path '${rootPath}' is empty`
    );
  }
  if (isParamSegment(name) || isVersionSegment(name)) {
    return fail(
      "invalidResourcePath",
      `could not build the resource name: path '${rootPath}' does not end with a resource name segment`
    );
  }

  const version = segments.at(-2);
  return ok(isVersionSegment(version) ? `${name}_${version}` : name);
}

/**
 * The version suffix `buildResourceName` would use, if any.
 */
export function getRootPathVersion(rootPath: string): string | undefined {
  const version = splitPath(rootPath).at(-2);
  return isVersionSegment(version) ? version : undefined;
}

export type ParentResourceInfo = {
  /** Ancestor names, outermost first: `["cdns_v1", "firewalls_v2"]` */
  parentResourceNames: string[];
  /** `cdns_v1_firewalls_v2` */
  fullParentResourceName: string;
  /** `/v1/cdns`, `/v1/cdns/{id}/v2/firewalls` */
  parentRootPaths: string[];
  /** `/v1/cdns/{id}`, `/v1/cdns/{id}/v2/firewalls/{id}` */
  parentInstancePaths: string[];
};

/**
 * Ancestors of a sub-resource root path. Every parameter segment that is
 * followed by more path names its preceding segment as a parent; a version
 * segment before that parent is appended as a suffix.
 * Returns undefined for top level resources.
 */
export function getParentResourceInfo(
  rootPath: string
): ParentResourceInfo | undefined {
  const segments = splitPath(rootPath);
  const info: ParentResourceInfo = {
    parentResourceNames: [],
    fullParentResourceName: "",
    parentRootPaths: [],
    parentInstancePaths: [],
  };

  for (let i = 1; i < segments.length - 1; i++) {
    const parent = segments[i - 1];
    if (!isParamSegment(segments[i]) || parent === undefined) continue;
    if (isParamSegment(parent) || isVersionSegment(parent)) continue;

    const version = segments[i - 2];
    info.parentResourceNames.push(
      isVersionSegment(version) ? `${parent}_${version}` : parent
    );
    info.parentRootPaths.push("/" + segments.slice(0, i).join("/"));
    info.parentInstancePaths.push("/" + segments.slice(0, i + 1).join("/"));
  }

  if (info.parentResourceNames.length === 0) return undefined;
  info.fullParentResourceName = info.parentResourceNames.join("_");
  return info;
}

export type SubResourceInfo = {
  isSubResource: boolean;
  parentResourceNames: string[];
  fullParentResourceName: string;
};

export function isSubResource(rootPath: string): SubResourceInfo {
  const info = getParentResourceInfo(rootPath);
  return {
    isSubResource: info !== undefined,
    parentResourceNames: info?.parentResourceNames ?? [],
    fullParentResourceName: info?.fullParentResourceName ?? "",
  };
}

/**
 * Names of the properties that carry each ancestor's identifier.
 * `/v2/cdns/{id}/v1/firewalls` → `["cdns_v2_id"]`
 */
export function getParentPropertiesNames(rootPath: string): string[] {
  return isSubResource(rootPath).parentResourceNames.map(
    (name) => `${name}_id`
  );
}

/**
 * Full name of the resource found at `rootPath`: ancestor names and the
 * local name joined with `_`. A name override replaces the whole name.
 */
export function resolveResourceName(
  rootPath: string,
  options: { overrideName?: string; appendVersionToOverriddenName?: boolean } = {}
): AnalysisResult<string> {
  if (options.overrideName !== undefined) {
    const version = options.appendVersionToOverriddenName
      ? getRootPathVersion(rootPath)
      : undefined;
    return ok(
      version ? `${options.overrideName}_${version}` : options.overrideName
    );
  }

  const localName = buildResourceName(rootPath);
  if (!localName.success) return localName;

  const parents = isSubResource(rootPath).parentResourceNames;
  return ok([...parents, localName.data].join("_"));
}

/**
 * Simple name of the resource behind an instance path: the last segment of
 * its root that is neither a parameter nor a version, suffixed with the
 * first version found anywhere in the path.
 *
 * `/api/v1/nodes/{name}/proxy/{path}` → `proxy_v1`
 */
export function getResourceName(instancePath: string): AnalysisResult<string> {
  const rootPrefix = getInstanceRootPrefix(instancePath);
  if (rootPrefix === undefined) {
    return fail(
      "notInstancePath",
      `path '${instancePath}' is not a resource instance path`
    );
  }

  const segments = splitPath(rootPrefix);
  const name = segments
    .filter((segment) => !isParamSegment(segment) && !isVersionSegment(segment))
    .at(-1);
  if (name === undefined) {
    return fail(
      "invalidResourcePath",
      `could not find a resource name in path '${instancePath}'`
    );
  }

  const version = segments.find((segment) => isVersionSegment(segment));
  return ok(version ? `${name}_${version}` : name);
}

/**
 * Substitutes the `{param}` placeholders of a root path template with the
 * given parent ids, outermost first.
 */
export function getResourcePath(
  rootPath: string,
  ids: readonly string[]
): AnalysisResult<string> {
  const params = rootPath.match(PATH_PARAM) ?? [];
  if (ids.length < params.length) {
    return fail(
      "pathParamsMismatch",
      `could not resolve sub-resource path correctly '${rootPath}' with the given ids - missing ids to resolve the path params properly (expected ${params.length}, got ${ids.length})`
    );
  }
  if (ids.length > params.length) {
    return fail(
      "pathParamsMismatch",
      `could not resolve sub-resource path correctly '${rootPath}' with the given ids - more ids than path params (expected ${params.length}, got ${ids.length})`
    );
  }

  let index = 0;
  return ok(rootPath.replace(PATH_PARAM, () => ids[index++] ?? ""));
}
