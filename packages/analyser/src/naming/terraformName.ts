/**
 * Converts a property name into a terraform compliant snake_case name.
 * `thisPropIsNotTerraformField_Compliant` → `this_prop_is_not_terraform_field_compliant`
 */
export const toTerraformName = (name: string): string =>
  name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[\s.-]+/g, "_")
    .replace(/_+/g, "_")
    .toLowerCase();
