/**
 * Swagger 2.0 document model
 * https://swagger.io/specification/v2/
 *
 * Only the parts the resource analysis reads are typed. Every object is
 * loose so vendor extensions (`x-*`) survive parsing.
 */

import { z } from "zod";

export namespace Swagger {
  // ===========================================================================
  // Schema (recursive - uses z.lazy)
  // ===========================================================================

  export interface SchemaType {
    type?: string | string[];
    format?: string;
    description?: string;
    $ref?: string;
    items?: SchemaType;
    properties?: Record<string, SchemaType>;
    required?: string[];
    readOnly?: boolean;
    default?: unknown;
    enum?: unknown[];
    [key: string]: unknown;
  }

  export const Schema: z.ZodType<SchemaType> = z.lazy(() =>
    z.looseObject({
      type: z.union([z.string(), z.array(z.string())]).optional(),
      format: z.string().optional(),
      description: z.string().optional(),
      $ref: z.string().optional(),
      items: Schema.optional(),
      properties: z.record(z.string(), Schema).optional(),
      required: z.array(z.string()).optional(),
      readOnly: z.boolean().optional(),
      default: z.unknown().optional(),
      enum: z.array(z.unknown()).optional(),
    })
  );

  // ===========================================================================
  // Operation layer
  // ===========================================================================

  export const ParameterLocation = z.enum([
    "query",
    "header",
    "path",
    "formData",
    "body",
  ]);

  export const ParameterObject = z.looseObject({
    name: z.string(),
    in: ParameterLocation,
    description: z.string().optional(),
    required: z.boolean().optional(),
    // body parameters only
    schema: Schema.optional(),
    // non-body parameters only
    type: z.string().optional(),
  });

  // `- $ref: "#/parameters/<name>"`, shared through the root `parameters` table
  export const ParameterRef = z.looseObject({
    $ref: z.string(),
  });

  export const Parameter = z.union([ParameterObject, ParameterRef]);

  export const Response = z.looseObject({
    description: z.string().optional(),
    schema: Schema.optional(),
  });

  export const Operation = z.looseObject({
    operationId: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    consumes: z.array(z.string()).optional(),
    produces: z.array(z.string()).optional(),
    parameters: z.array(Parameter).optional(),
    responses: z.record(z.string(), Response).optional(),
    schemes: z.array(z.string()).optional(),
    deprecated: z.boolean().optional(),
  });

  export const PathItem = z.looseObject({
    get: Operation.optional(),
    put: Operation.optional(),
    post: Operation.optional(),
    delete: Operation.optional(),
    options: Operation.optional(),
    head: Operation.optional(),
    patch: Operation.optional(),
    parameters: z.array(Parameter).optional(),
  });

  // ===========================================================================
  // Document
  // ===========================================================================

  export const Info = z.looseObject({
    title: z.coerce.string(),
    // `version: 1.0` reads as a number
    version: z.coerce.string(),
    description: z.string().optional(),
  });

  export const Document = z.looseObject({
    swagger: z.literal("2.0"),
    info: Info.optional(),
    host: z.string().optional(),
    basePath: z.string().optional(),
    schemes: z.array(z.string()).optional(),
    consumes: z.array(z.string()).optional(),
    produces: z.array(z.string()).optional(),
    paths: z.record(z.string(), PathItem),
    definitions: z.record(z.string(), Schema).optional(),
  });

  export type Schema = SchemaType;
  export type ParameterLocation = z.infer<typeof ParameterLocation>;
  export type ParameterObject = z.infer<typeof ParameterObject>;
  export type ParameterRef = z.infer<typeof ParameterRef>;
  export type Parameter = z.infer<typeof Parameter>;
  export type Response = z.infer<typeof Response>;
  export type Operation = z.infer<typeof Operation>;
  export type PathItem = z.infer<typeof PathItem>;
  export type Info = z.infer<typeof Info>;
  export type Document = z.infer<typeof Document>;
  export type Definitions = Record<string, SchemaType>;
}
