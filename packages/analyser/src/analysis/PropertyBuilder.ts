import { ok, err, mapErr } from "@oapi-tf/core/result";
import { parsePropertyExtensions } from "@oapi-tf/core/extensions";
import { Swagger } from "@oapi-tf/core/swagger";
import { AnalysisResult, fail, withContext } from "../errors.js";
import { toTerraformName } from "../naming/terraformName.js";
import {
  PropertyDescriptor,
  SchemaDefinition,
} from "../resource/SchemaDefinition.js";
import {
  isArraySchema,
  isObjectSchema,
  resolveSchemaType,
} from "./SchemaTypeResolver.js";
import { decidePropertyFlags, formatPropertyConflict } from "./PropertyFlags.js";

export type PropertyBuildContext = {
  definitions: Swagger.Definitions;
  maxDepth: number;
  /** Nesting level of the schema the property belongs to, 0 for the resource */
  depth: number;
};

const typeContext = (name: string, schema: Swagger.Schema): string => {
  if (isArraySchema(schema)) {
    return `failed to process array type property '${name}'`;
  }
  if (isObjectSchema(schema)) {
    return `failed to process object type property '${name}'`;
  }
  return `failed to process property '${name}'`;
};

export function buildProperty(
  name: string,
  schema: Swagger.Schema,
  requiredNames: readonly string[],
  ctx: PropertyBuildContext
): AnalysisResult<PropertyDescriptor> {
  if (ctx.depth > ctx.maxDepth) {
    return fail(
      "maxDepthExceeded",
      `failed to process property '${name}': schema nesting exceeds the maximum depth of ${ctx.maxDepth}`
    );
  }

  const resolved = mapErr(
    resolveSchemaType(schema, ctx.definitions),
    withContext(typeContext(name, schema))
  );
  if (!resolved.success) return resolved;

  const required = requiredNames.includes(name);
  const readOnly = schema.readOnly === true;
  const hasDefault = schema.default !== undefined && schema.default !== null;
  const extensions = parsePropertyExtensions(schema);

  const flags = decidePropertyFlags({
    required,
    readOnly,
    hasDefault,
    computedExtension: extensions.computed,
  });
  if (flags.type === "conflict") {
    return fail(
      "propertyConflict",
      formatPropertyConflict(flags.conflict, name)
    );
  }

  const nestedCtx = { ...ctx, depth: ctx.depth + 1 };
  let nestedSchema: SchemaDefinition | undefined;
  const type = resolved.data;
  if (type.type === "object") {
    const nested = buildSchemaDefinition(type.schema, nestedCtx);
    if (!nested.success) {
      return err(withContext(typeContext(name, schema))(nested.error));
    }
    nestedSchema = nested.data;
  } else if (type.type === "list" && type.items.type === "object") {
    const nested = buildSchemaDefinition(type.items.schema, nestedCtx);
    if (!nested.success) {
      return err(withContext(typeContext(name, schema))(nested.error));
    }
    nestedSchema = nested.data;
  }

  return ok({
    name,
    preferredName: toTerraformName(extensions.fieldName ?? name),
    type: type.type,
    arrayItemsType: type.type === "list" ? type.items.type : undefined,
    nestedSchema,
    required,
    readOnly,
    computed: flags.computed,
    forceNew: extensions.forceNew,
    sensitive: extensions.sensitive,
    immutable: extensions.immutable,
    isIdentifier: extensions.identifier,
    isStatusIdentifier: extensions.statusIdentifier,
    default: flags.keepDefault ? schema.default : undefined,
  });
}

/**
 * Builds every property of an object schema, in declaration order, using
 * the schema's own required list.
 */
export function buildSchemaDefinition(
  schema: Swagger.Schema,
  ctx: PropertyBuildContext
): AnalysisResult<SchemaDefinition> {
  const requiredNames = schema.required ?? [];
  const properties: PropertyDescriptor[] = [];
  for (const [name, property] of Object.entries(schema.properties ?? {})) {
    const built = buildProperty(name, property, requiredNames, ctx);
    if (!built.success) return built;
    properties.push(built.data);
  }
  return ok(new SchemaDefinition(properties));
}
