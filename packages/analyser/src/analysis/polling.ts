import {
  parseResponseExtensions,
  splitListExtension,
} from "@oapi-tf/core/extensions";
import { Swagger } from "@oapi-tf/core/swagger";

export interface PollingConfiguration {
  readonly pollEnabled: boolean;
  /** Terminal statuses */
  readonly targetStatuses: readonly string[];
  /** In-progress statuses */
  readonly pendingStatuses: readonly string[];
}

export type ResponsesPolling = ReadonlyMap<number, PollingConfiguration>;

export function getPollingConfiguration(
  response: Swagger.Response
): PollingConfiguration {
  const extensions = parseResponseExtensions(response);
  return {
    pollEnabled: extensions.pollEnabled,
    targetStatuses: splitListExtension(extensions.pollCompletedStatuses),
    pendingStatuses: splitListExtension(extensions.pollPendingStatuses),
  };
}

/**
 * Polling configuration of every numeric response code of the operation.
 * `default` responses carry no status code and are skipped.
 */
export function getResponsesPolling(
  operation: Swagger.Operation | undefined
): ResponsesPolling {
  const responses = new Map<number, PollingConfiguration>();
  for (const [code, response] of Object.entries(operation?.responses ?? {})) {
    if (!/^\d{3}$/.test(code)) continue;
    responses.set(Number(code), getPollingConfiguration(response));
  }
  return responses;
}
