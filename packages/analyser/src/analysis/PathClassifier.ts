import { Option, ok, none, some, mapErr } from "@oapi-tf/core/result";
import {
  parseOperationExtensions,
  parsePropertyExtensions,
} from "@oapi-tf/core/extensions";
import { Swagger, hasRef, isBodyParameter } from "@oapi-tf/core/swagger";
import { AnalysisResult, fail, withContext } from "../errors.js";
import {
  getInstanceRootPrefix,
  isResourceInstanceEndPoint,
} from "../naming/ResourceNaming.js";
import { IDENTIFIER_PROPERTY_NAME } from "../resource/SchemaDefinition.js";
import { resolveDefinition } from "./SchemaTypeResolver.js";

export type ResourceRoot = {
  rootPath: string;
  rootPathItem: Swagger.PathItem;
  /** The POST body schema, refs resolved */
  payloadSchema: Swagger.Schema;
};

export type CompliantEndpoint = ResourceRoot & {
  instancePath: string;
  instancePathItem: Swagger.PathItem;
};

/**
 * Decides which paths of the document describe a terraform resource: an
 * instance path with GET, a matching root path with POST, and a POST body
 * schema that identifies the resource.
 */
export class PathClassifier {
  constructor(
    private readonly paths: Record<string, Swagger.PathItem>,
    private readonly definitions: Swagger.Definitions
  ) {}

  getPathItem(path: string): Swagger.PathItem | undefined {
    return Object.hasOwn(this.paths, path) ? this.paths[path] : undefined;
  }

  /**
   * Looks the path up as is, then with a trailing slash.
   */
  pathExists(path: string): Option<{ path: string; item: Swagger.PathItem }> {
    for (const candidate of [path, `${path}/`]) {
      const item = this.getPathItem(candidate);
      if (item) return some({ path: candidate, item });
    }
    return none();
  }

  isResourceInstanceEndPoint(path: string): boolean {
    return isResourceInstanceEndPoint(path);
  }

  validateInstancePath(path: string): AnalysisResult<Swagger.PathItem> {
    if (!isResourceInstanceEndPoint(path)) {
      return fail(
        "notInstancePath",
        `path '${path}' is not a resource instance path`
      );
    }
    const item = this.getPathItem(path);
    if (!item?.get) {
      return fail(
        "missingGetOperation",
        `resource instance path '${path}' missing required GET operation`
      );
    }
    return ok(item);
  }

  /**
   * `/users/{id}` → `/users/` if declared, else `/users`.
   */
  findMatchingResourceRootPath(instancePath: string): AnalysisResult<string> {
    const prefix = getInstanceRootPrefix(instancePath);
    if (prefix !== undefined) {
      const trimmed = prefix.replace(/\/+$/, "");
      for (const candidate of [prefix, trimmed]) {
        if (candidate !== "" && this.getPathItem(candidate)) {
          return ok(candidate);
        }
      }
    }
    return fail(
      "missingRootPath",
      `resource instance path '${instancePath}' missing resource root path`
    );
  }

  validateRootPath(instancePath: string): AnalysisResult<ResourceRoot> {
    const rootPath = this.findMatchingResourceRootPath(instancePath);
    if (!rootPath.success) return rootPath;

    const rootPathItem = this.getPathItem(rootPath.data);
    if (!rootPathItem?.post) {
      return fail(
        "missingPostOperation",
        `resource root path '${rootPath.data}' missing required POST operation`
      );
    }

    const payloadSchema = mapErr(
      this.getBodyParameterSchema(rootPathItem.post),
      withContext(
        `resource root path '${rootPath.data}' POST operation validation error`
      )
    );
    if (!payloadSchema.success) return payloadSchema;

    return ok({
      rootPath: rootPath.data,
      rootPathItem,
      payloadSchema: payloadSchema.data,
    });
  }

  /**
   * The single `in: body` parameter schema of the root POST operation,
   * resolved against the definitions table.
   */
  getBodyParameterSchema(
    operation: Swagger.Operation
  ): AnalysisResult<Swagger.Schema> {
    const bodyParameters = (operation.parameters ?? []).filter(isBodyParameter);
    const [bodyParameter] = bodyParameters;
    if (bodyParameter === undefined) {
      return fail(
        "invalidBodyParameter",
        "resource root operation missing the body parameter"
      );
    }
    if (bodyParameters.length > 1) {
      return fail(
        "invalidBodyParameter",
        "resource root operation contains multiple 'body' parameters"
      );
    }
    if (!bodyParameter.schema) {
      return fail(
        "invalidBodyParameter",
        "resource root operation missing the schema for the POST operation body parameter"
      );
    }

    const schema = hasRef(bodyParameter.schema)
      ? resolveDefinition(bodyParameter.schema.$ref, this.definitions)
      : ok(bodyParameter.schema);
    if (!schema.success) return schema;

    if (Object.keys(schema.data.properties ?? {}).length === 0) {
      return fail(
        "emptySchema",
        "POST operation contains a schema with no properties"
      );
    }
    return schema;
  }

  /**
   * The payload must carry a property named `id` or one flagged with
   * `x-terraform-id`.
   */
  validateResourceSchemaDefinition(
    schema: Swagger.Schema
  ): AnalysisResult<string> {
    const properties = Object.entries(schema.properties ?? {});
    const flagged = properties.find(
      ([, property]) => parsePropertyExtensions(property).identifier
    );
    if (flagged) return ok(flagged[0]);
    if (properties.some(([name]) => name === IDENTIFIER_PROPERTY_NAME)) {
      return ok(IDENTIFIER_PROPERTY_NAME);
    }
    return fail(
      "missingIdentifier",
      "resource schema is missing a property that uniquely identifies the resource, either a property named 'id' or a property with the extension 'x-terraform-id' set to true"
    );
  }

  /**
   * Runs the instance, root and schema checks in order; the first failure
   * is returned.
   */
  isEndPointFullyTerraformResourceCompliant(
    path: string
  ): AnalysisResult<CompliantEndpoint> {
    const instancePathItem = this.validateInstancePath(path);
    if (!instancePathItem.success) return instancePathItem;

    const root = this.validateRootPath(path);
    if (!root.success) return root;

    const identifier = this.validateResourceSchemaDefinition(
      root.data.payloadSchema
    );
    if (!identifier.success) return identifier;

    return ok({
      ...root.data,
      instancePath: path,
      instancePathItem: instancePathItem.data,
    });
  }

  isExcluded(pathItem: Swagger.PathItem): boolean {
    return parseOperationExtensions(pathItem.post).excludeResource;
  }
}
