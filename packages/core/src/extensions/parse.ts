import { z } from "zod";
import { REGIONS_EXTENSION_PREFIX, TerraformExtension as Ext } from "./constants.js";

// A value of the wrong type reads as absent rather than failing the parse
const flag = z.boolean().optional().catch(undefined);
const text = z.string().optional().catch(undefined);

export const PropertyExtensions = z
  .object({
    [Ext.fieldName]: text,
    [Ext.forceNew]: flag,
    [Ext.sensitive]: flag,
    [Ext.identifier]: flag,
    [Ext.immutable]: flag,
    [Ext.fieldStatus]: flag,
    [Ext.computed]: flag,
  })
  .transform((ext) => ({
    fieldName: ext[Ext.fieldName] || undefined,
    forceNew: ext[Ext.forceNew] ?? false,
    sensitive: ext[Ext.sensitive] ?? false,
    identifier: ext[Ext.identifier] ?? false,
    immutable: ext[Ext.immutable] ?? false,
    statusIdentifier: ext[Ext.fieldStatus] ?? false,
    computed: ext[Ext.computed] ?? false,
  }));

export type PropertyExtensions = z.infer<typeof PropertyExtensions>;

export const OperationExtensions = z
  .object({
    [Ext.excludeResource]: flag,
    [Ext.resourceName]: text,
    [Ext.resourceHost]: text,
    [Ext.resourceTimeout]: text,
  })
  .transform((ext) => ({
    excludeResource: ext[Ext.excludeResource] ?? false,
    resourceName: ext[Ext.resourceName] || undefined,
    resourceHost: ext[Ext.resourceHost] || undefined,
    resourceTimeout: ext[Ext.resourceTimeout],
  }));

export type OperationExtensions = z.infer<typeof OperationExtensions>;

export const ResponseExtensions = z
  .object({
    [Ext.pollEnabled]: flag,
    [Ext.pollCompletedStatuses]: text,
    [Ext.pollPendingStatuses]: text,
  })
  .transform((ext) => ({
    pollEnabled: ext[Ext.pollEnabled] ?? false,
    pollCompletedStatuses: ext[Ext.pollCompletedStatuses],
    pollPendingStatuses: ext[Ext.pollPendingStatuses],
  }));

export type ResponseExtensions = z.infer<typeof ResponseExtensions>;

export const parsePropertyExtensions = (schema: object): PropertyExtensions =>
  PropertyExtensions.parse(schema);

export const parseOperationExtensions = (
  operation: object | undefined
): OperationExtensions => OperationExtensions.parse(operation ?? {});

export const parseResponseExtensions = (response: object): ResponseExtensions =>
  ResponseExtensions.parse(response);

export const regionsExtensionName = (keyword: string): string =>
  `${REGIONS_EXTENSION_PREFIX}${keyword}`;

/**
 * Reads the root level `x-terraform-resource-regions-<keyword>` value.
 */
export const getRegionsExtension = (
  document: Record<string, unknown>,
  keyword: string
): string | undefined => {
  const value = document[regionsExtensionName(keyword)];
  return typeof value === "string" ? value : undefined;
};

/**
 * Splits a comma separated extension value, ignoring blanks and spaces.
 * `"deployed, completed , done"` → `["deployed", "completed", "done"]`
 */
export const splitListExtension = (value: string | undefined): string[] => {
  if (value === undefined) return [];
  return value
    .replace(/ /g, "")
    .split(",")
    .filter((entry) => entry !== "");
};
