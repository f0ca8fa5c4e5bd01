import { ok } from "@oapi-tf/core/result";
import { parseOperationExtensions } from "@oapi-tf/core/extensions";
import { Swagger } from "@oapi-tf/core/swagger";
import { AnalysisResult, fail } from "../errors.js";

/** Durations are expressed in milliseconds */
export type Duration = number;

export interface ResourceTimeouts {
  readonly create?: Duration;
  readonly read?: Duration;
  readonly update?: Duration;
  readonly delete?: Duration;
}

const DURATION = /^(\d+(?:\.\d+)?|\.\d+)([smh])$/;

const UNIT_MILLISECONDS = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
} as const;

const isDurationUnit = (unit: string): unit is keyof typeof UNIT_MILLISECONDS =>
  Object.hasOwn(UNIT_MILLISECONDS, unit);

/**
 * `"30s"`, `"20.5m"`, `"1h"`. Only seconds, minutes and hours are accepted.
 */
export function getTimeDuration(value: string): AnalysisResult<Duration> {
  const match = DURATION.exec(value);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined || !isDurationUnit(unit)) {
    return fail(
      "invalidDuration",
      `invalid duration value: '${value}'. The value must be a sequence of decimal numbers each with optional fraction and a unit suffix (negative durations are not allowed). The value must be formatted either in seconds (s), minutes (m) or hours (h)`
    );
  }
  return ok(Math.round(Number(amount) * UNIT_MILLISECONDS[unit]));
}

/**
 * The operation's `x-terraform-resource-timeout`, undefined when absent.
 */
export function getResourceTimeout(
  operation: Swagger.Operation | undefined
): AnalysisResult<Duration | undefined> {
  const timeout = parseOperationExtensions(operation).resourceTimeout;
  if (timeout === undefined) return ok(undefined);
  return getTimeDuration(timeout);
}

export function getResourceTimeouts(
  rootPathItem: Swagger.PathItem,
  instancePathItem: Swagger.PathItem
): AnalysisResult<ResourceTimeouts> {
  const create = getResourceTimeout(rootPathItem.post);
  if (!create.success) return create;
  const read = getResourceTimeout(instancePathItem.get);
  if (!read.success) return read;
  const update = getResourceTimeout(instancePathItem.put);
  if (!update.success) return update;
  const remove = getResourceTimeout(instancePathItem.delete);
  if (!remove.success) return remove;

  return ok({
    create: create.data,
    read: read.data,
    update: update.data,
    delete: remove.data,
  });
}
