import { ok } from "@oapi-tf/core/result";
import {
  getRegionsExtension,
  regionsExtensionName,
  splitListExtension,
} from "@oapi-tf/core/extensions";
import { AnalysisResult, fail } from "../errors.js";

const MULTI_REGION_HOST = /^(\S*)\$\{(\w+)\}(\S*)$/;

export type MultiRegionInfo = {
  /** Host with a `${keyword}` placeholder: `api.${region}.example.com` */
  hostTemplate: string;
  keyword: string;
  regions: string[];
};

/**
 * The placeholder keyword of a region parametrized host, if it is one.
 */
export function getMultiRegionKeyword(host: string): string | undefined {
  return MULTI_REGION_HOST.exec(host)?.[2];
}

export function resolveRegionHost(info: MultiRegionInfo, region: string): string {
  return info.hostTemplate.replace(`\${${info.keyword}}`, () => region);
}

/**
 * A host such as `api.${region}.example.com` makes the resource multi-region
 * when the document declares `x-terraform-resource-regions-region` at the
 * root. Returns undefined for hosts that are not parametrized.
 */
export function getMultiRegionInfo(
  host: string | undefined,
  document: Record<string, unknown>
): AnalysisResult<MultiRegionInfo | undefined> {
  if (host === undefined) return ok(undefined);
  const keyword = getMultiRegionKeyword(host);
  if (keyword === undefined) return ok(undefined);

  const extensionName = regionsExtensionName(keyword);
  const value = getRegionsExtension(document, keyword);
  if (value === undefined) {
    return fail(
      "missingRegionExtension",
      `missing matching '${keyword}' root level region extension '${extensionName}'`
    );
  }

  const regions = splitListExtension(value);
  if (regions.length === 0) {
    return fail(
      "emptyRegionList",
      `could not find any region for '${keyword}' matching region extension ${extensionName}: '${value}'`
    );
  }
  return ok({ hostTemplate: host, keyword, regions });
}
