export const TerraformExtension = {
  // schema properties
  fieldName: "x-terraform-field-name",
  forceNew: "x-terraform-force-new",
  sensitive: "x-terraform-sensitive",
  identifier: "x-terraform-id",
  immutable: "x-terraform-immutable",
  fieldStatus: "x-terraform-field-status",
  computed: "x-terraform-computed",
  // operations
  excludeResource: "x-terraform-exclude-resource",
  resourceName: "x-terraform-resource-name",
  resourceHost: "x-terraform-resource-host",
  resourceTimeout: "x-terraform-resource-timeout",
  // responses
  pollEnabled: "x-terraform-resource-poll-enabled",
  pollCompletedStatuses: "x-terraform-resource-poll-completed-statuses",
  pollPendingStatuses: "x-terraform-resource-poll-pending-statuses",
} as const;

export type TerraformExtension =
  (typeof TerraformExtension)[keyof typeof TerraformExtension];

export const REGIONS_EXTENSION_PREFIX = "x-terraform-resource-regions-";
