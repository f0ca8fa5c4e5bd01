import { Swagger } from "./types.js";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isParameterRef = (
  parameter: Swagger.Parameter
): parameter is Swagger.ParameterRef => typeof parameter.$ref === "string";

export const isBodyParameter = (
  parameter: Swagger.Parameter
): parameter is Swagger.ParameterObject =>
  !isParameterRef(parameter) && parameter.in === "body";

export const getSchemaTypes = (schema: Swagger.Schema): string[] => {
  if (schema.type === undefined) return [];
  return Array.isArray(schema.type) ? schema.type : [schema.type];
};

export const hasSchemaType = (schema: Swagger.Schema, type: string): boolean =>
  getSchemaTypes(schema).includes(type);

export const hasRef = (schema: Swagger.Schema): schema is Swagger.Schema & { $ref: string } =>
  typeof schema.$ref === "string" && schema.$ref !== "";
