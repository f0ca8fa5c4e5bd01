import { z } from "zod";
import { parse, stringify } from "yaml";
import { Result, ok, err } from "../result/result.js";

/**
 * Plugin configuration, version 1:
 *
 * ```yaml
 * version: '1'
 * services:
 *   cdn:
 *     swagger-url: https://cdn-api.com/swagger.json
 *     insecure_skip_verify: true
 * ```
 */
export const ServiceConfig = z.object({
  "swagger-url": z.string().min(1),
  insecure_skip_verify: z.boolean().optional(),
});

export type ServiceConfig = z.infer<typeof ServiceConfig>;

export const ServiceConfiguration = z.object({
  version: z.coerce.string(),
  services: z.record(z.string(), ServiceConfig).default({}),
});

export type ServiceConfiguration = z.infer<typeof ServiceConfiguration>;

export type ServiceConfigurationError =
  | { type: "parse"; message: string }
  | { type: "invalid"; message: string }
  | { type: "unsupportedVersion"; version: string }
  | { type: "missingProviderName" }
  | { type: "serviceNotFound"; providerName: string };

export const SERVICE_CONFIGURATION_VERSION = "1";

export function parseServiceConfiguration(
  text: string
): Result<ServiceConfiguration, ServiceConfigurationError> {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err({ type: "parse", message });
  }

  const parsed = ServiceConfiguration.safeParse(raw);
  if (!parsed.success) {
    return err({ type: "invalid", message: z.prettifyError(parsed.error) });
  }
  if (parsed.data.version !== SERVICE_CONFIGURATION_VERSION) {
    return err({ type: "unsupportedVersion", version: parsed.data.version });
  }
  return ok(parsed.data);
}

export function getServiceConfig(
  configuration: ServiceConfiguration,
  providerName: string
): Result<ServiceConfig, ServiceConfigurationError> {
  if (providerName === "") {
    return err({ type: "missingProviderName" });
  }
  const service = Object.hasOwn(configuration.services, providerName)
    ? configuration.services[providerName]
    : undefined;
  if (!service) {
    return err({ type: "serviceNotFound", providerName });
  }
  return ok(service);
}

export function getAllServiceConfigurations(
  configuration: ServiceConfiguration
): Record<string, ServiceConfig> {
  return { ...configuration.services };
}

export function stringifyServiceConfiguration(
  configuration: ServiceConfiguration
): string {
  return stringify(configuration);
}

export function formatServiceConfigurationError(
  error: ServiceConfigurationError
): string {
  switch (error.type) {
    case "parse":
      return `failed to parse the provider configuration: ${error.message}`;
    case "invalid":
      return `invalid provider configuration: ${error.message}`;
    case "unsupportedVersion":
      return `provider configuration version not matching current implementation, please use version '${SERVICE_CONFIGURATION_VERSION}' of provider configuration specification`;
    case "missingProviderName":
      return "providerName not specified";
    case "serviceNotFound":
      return `'${error.providerName}' not found in provider's services configuration`;
  }
}
