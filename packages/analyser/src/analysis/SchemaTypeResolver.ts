import { ok, mapErr } from "@oapi-tf/core/result";
import { parseDefinitionRef } from "@oapi-tf/core/ref";
import {
  Swagger,
  getSchemaTypes,
  hasRef,
  hasSchemaType,
} from "@oapi-tf/core/swagger";
import { AnalysisResult, fail, withContext } from "../errors.js";

export type PrimitiveType = "string" | "integer" | "float" | "boolean";

export type PropertyType = PrimitiveType | "list" | "object";

export type ItemsType = PrimitiveType | "object";

export type ResolvedItems =
  | { type: PrimitiveType }
  | { type: "object"; schema: Swagger.Schema };

export type ResolvedType =
  | { type: PrimitiveType }
  | { type: "object"; schema: Swagger.Schema }
  | { type: "list"; items: ResolvedItems };

const PRIMITIVE_TYPES: Record<string, PrimitiveType> = {
  string: "string",
  integer: "integer",
  number: "float",
  boolean: "boolean",
};

/**
 * Looks a `#/definitions/<name>` ref up in the definitions table.
 * Refs anywhere else mean the document was not expanded before analysis.
 */
export function resolveDefinition(
  ref: string,
  definitions: Swagger.Definitions
): AnalysisResult<Swagger.Schema> {
  const name = parseDefinitionRef(ref);
  if (!name.success) {
    return fail(
      "unexpandedRef",
      `ref '${ref}' has not been expanded by the document loader; only '#/definitions/' refs are supported`
    );
  }
  const definition = Object.hasOwn(definitions, name.data)
    ? definitions[name.data]
    : undefined;
  if (definition === undefined) {
    return fail(
      "missingDefinition",
      `missing schema definition in the swagger file with the supplied ref '${ref}'`
    );
  }
  return ok(definition);
}

export const isObjectSchema = (schema: Swagger.Schema): boolean =>
  hasSchemaType(schema, "object") ||
  (getSchemaTypes(schema).length === 0 && hasRef(schema));

export const isArraySchema = (schema: Swagger.Schema): boolean =>
  hasSchemaType(schema, "array");

function resolvePrimitive(schema: Swagger.Schema): AnalysisResult<PrimitiveType> {
  const types = getSchemaTypes(schema);
  for (const type of types) {
    if (Object.hasOwn(PRIMITIVE_TYPES, type)) {
      const primitive = PRIMITIVE_TYPES[type];
      if (primitive) return ok(primitive);
    }
  }
  return fail("unsupportedType", `non supported '[${types.join(" ")}]' type`);
}

/**
 * The schema holding an object's properties: inline properties first,
 * otherwise the definition its `$ref` points at.
 */
export function resolveObjectSchema(
  schema: Swagger.Schema,
  definitions: Swagger.Definitions
): AnalysisResult<Swagger.Schema> {
  if (schema.properties && Object.keys(schema.properties).length > 0) {
    return ok(schema);
  }
  if (hasRef(schema)) {
    return mapErr(
      resolveDefinition(schema.$ref, definitions),
      withContext("object ref is pointing to a non existing schema definition")
    );
  }
  return fail(
    "invalidObject",
    "object is missing the nested schema definition or the ref is pointing to a non existing schema definition"
  );
}

function resolveArrayItems(
  schema: Swagger.Schema,
  definitions: Swagger.Definitions
): AnalysisResult<ResolvedItems> {
  const items = schema.items;
  if (!items) {
    return fail(
      "invalidArrayItems",
      "array property is missing items schema definition"
    );
  }
  if (isArraySchema(items)) {
    return fail(
      "invalidArrayItems",
      "array property can not have items of type 'array'"
    );
  }
  if (isObjectSchema(items) || hasRef(items)) {
    const nested = resolveObjectSchema(items, definitions);
    if (!nested.success) return nested;
    return ok({ type: "object", schema: nested.data });
  }

  const primitive = resolvePrimitive(items);
  if (!primitive.success) return primitive;
  return ok({ type: primitive.data });
}

export function resolveSchemaType(
  schema: Swagger.Schema,
  definitions: Swagger.Definitions
): AnalysisResult<ResolvedType> {
  if (isArraySchema(schema)) {
    const items = resolveArrayItems(schema, definitions);
    if (!items.success) return items;
    return ok({ type: "list", items: items.data });
  }

  if (isObjectSchema(schema)) {
    const nested = resolveObjectSchema(schema, definitions);
    if (!nested.success) return nested;
    return ok({ type: "object", schema: nested.data });
  }

  const primitive = resolvePrimitive(schema);
  if (!primitive.success) return primitive;
  return ok({ type: primitive.data });
}
