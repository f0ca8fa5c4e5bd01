import { z } from "zod";
import { ok, mapErr } from "@oapi-tf/core/result";
import { AnalyserConfiguration } from "@oapi-tf/core/configuration";
import { parseOperationExtensions } from "@oapi-tf/core/extensions";
import { ConsoleLogger, Logger } from "@oapi-tf/core/logging";
import { Swagger } from "@oapi-tf/core/swagger";
import { AnalysisResult, fail, withContext } from "../errors.js";
import {
  ParentResourceInfo,
  getParentResourceInfo,
  getResourceName,
  resolveResourceName,
} from "../naming/ResourceNaming.js";
import { BackendConfiguration } from "../resource/BackendConfiguration.js";
import {
  PropertyDescriptor,
  SchemaDefinition,
} from "../resource/SchemaDefinition.js";
import {
  ResourceOperation,
  ResourceOperations,
  SpecResource,
} from "../resource/SpecResource.js";
import {
  CompliantEndpoint,
  PathClassifier,
  ResourceRoot,
} from "./PathClassifier.js";
import { buildSchemaDefinition } from "./PropertyBuilder.js";
import { getMultiRegionInfo, resolveRegionHost } from "./multiRegion.js";
import { getResponsesPolling } from "./polling.js";
import { ResourceTimeouts, getResourceTimeouts } from "./timeouts.js";

export type SpecAnalyserOptions = {
  configuration?: z.input<typeof AnalyserConfiguration>;
  logger?: Logger;
};

/**
 * Read-only, computed string property holding the identifier of one of
 * the resource's ancestors.
 */
export const createParentIdProperty = (name: string): PropertyDescriptor => ({
  name,
  preferredName: name,
  type: "string",
  required: false,
  readOnly: true,
  computed: true,
  forceNew: false,
  sensitive: false,
  immutable: false,
  isIdentifier: false,
  isStatusIdentifier: false,
});

/**
 * Walks the path table of a Swagger 2.0 document and builds one
 * `SpecResource` per terraform compliant resource.
 */
export class SpecAnalyser {
  readonly configuration: AnalyserConfiguration;
  private readonly logger: Logger;
  private readonly classifier: PathClassifier;

  constructor(
    private readonly document: Swagger.Document,
    options: SpecAnalyserOptions = {}
  ) {
    this.configuration = AnalyserConfiguration.parse(
      options.configuration ?? {}
    );
    this.logger =
      options.logger ??
      new ConsoleLogger({ debug: this.configuration["debug.analysis"] });
    this.classifier = new PathClassifier(
      document.paths,
      document.definitions ?? {}
    );
  }

  // ----- Path classification -----

  isResourceInstanceEndPoint(path: string): boolean {
    return this.classifier.isResourceInstanceEndPoint(path);
  }

  validateInstancePath(path: string): AnalysisResult<Swagger.PathItem> {
    return this.classifier.validateInstancePath(path);
  }

  findMatchingResourceRootPath(path: string): AnalysisResult<string> {
    return this.classifier.findMatchingResourceRootPath(path);
  }

  validateRootPath(path: string): AnalysisResult<ResourceRoot> {
    return this.classifier.validateRootPath(path);
  }

  validateResourceSchemaDefinition(
    schema: Swagger.Schema
  ): AnalysisResult<string> {
    return this.classifier.validateResourceSchemaDefinition(schema);
  }

  isEndPointFullyTerraformResourceCompliant(
    path: string
  ): AnalysisResult<CompliantEndpoint> {
    return this.classifier.isEndPointFullyTerraformResourceCompliant(path);
  }

  getResourceName(instancePath: string): AnalysisResult<string> {
    return getResourceName(instancePath);
  }

  getBackendConfiguration(): AnalysisResult<BackendConfiguration> {
    return BackendConfiguration.fromDocument(this.document);
  }

  // ----- Resources -----

  /**
   * Every terraform compliant resource of the document. Paths that do not
   * qualify are logged and skipped; the analysis itself does not fail.
   */
  getResourcesInfo(): AnalysisResult<SpecResource[]> {
    const start = performance.now();
    const resources: SpecResource[] = [];

    for (const path of Object.keys(this.document.paths)) {
      const endpoint =
        this.classifier.isEndPointFullyTerraformResourceCompliant(path);
      if (!endpoint.success) {
        this.logger.debug(
          `resource path '${path}' not terraform compliant: ${endpoint.error.message}`
        );
        continue;
      }
      if (this.classifier.isExcluded(endpoint.data.rootPathItem)) {
        this.logger.info(
          `ignoring resource '${endpoint.data.rootPath}' marked with 'x-terraform-exclude-resource'`
        );
        continue;
      }

      const built = this.createResources(endpoint.data);
      if (!built.success) {
        this.logger.warn(
          `ignoring resource '${endpoint.data.rootPath}': ${built.error.message}`
        );
        continue;
      }

      for (const resource of built.data) {
        const region =
          resource.region === undefined ? "" : `, region='${resource.region}'`;
        this.logger.info(
          `found terraform compliant resource [name='${resource.name}', rootPath='${resource.rootPath}', instancePath='${resource.instancePath}'${region}]`
        );
      }
      resources.push(...built.data);
    }

    const elapsed = Math.round(performance.now() - start);
    this.logger.info(
      `found ${resources.length} terraform compliant resources (time: ${elapsed}ms)`
    );
    return ok(this.sortResources(resources));
  }

  getTerraformCompliantResources(): AnalysisResult<SpecResource[]> {
    return this.getResourcesInfo();
  }

  private sortResources(resources: SpecResource[]): SpecResource[] {
    if (this.configuration["resources.order"] === "declaration") {
      return resources;
    }
    const key = (r: SpecResource) => `${r.name}\u0000${r.region ?? ""}`;
    return [...resources].sort((a, b) =>
      key(a) < key(b) ? -1 : key(a) > key(b) ? 1 : 0
    );
  }

  private createResources(
    endpoint: CompliantEndpoint
  ): AnalysisResult<SpecResource[]> {
    const { rootPath, rootPathItem, instancePathItem } = endpoint;
    const extensions = parseOperationExtensions(rootPathItem.post);
    const parentInfo = getParentResourceInfo(rootPath);
    const parentCheck = this.validateSubResourceTerraformCompliance(
      rootPath,
      parentInfo
    );
    if (!parentCheck.success) return parentCheck;

    const multiRegion = mapErr(
      getMultiRegionInfo(extensions.resourceHost, this.document),
      withContext("multi region configuration is not valid")
    );
    if (!multiRegion.success) return multiRegion;

    const name = resolveResourceName(rootPath, {
      overrideName: extensions.resourceName,
      appendVersionToOverriddenName:
        this.configuration["naming.appendVersionToOverriddenName"],
    });
    if (!name.success) return name;

    const schema = this.buildResourceSchema(endpoint.payloadSchema, parentInfo);
    if (!schema.success) return schema;

    const timeouts = getResourceTimeouts(rootPathItem, instancePathItem);
    if (!timeouts.success) return timeouts;

    const operations = createOperations(endpoint, timeouts.data);
    if (!operations.success) return operations;

    const init = {
      name: name.data,
      rootPath,
      instancePath: endpoint.instancePath,
      schema: schema.data,
      operations: operations.data,
      timeouts: timeouts.data,
      parentInfo,
    };

    const regionInfo = multiRegion.data;
    if (regionInfo === undefined) {
      return ok([new SpecResource({ ...init, host: extensions.resourceHost })]);
    }

    this.logger.info(
      `resource '${rootPath}' is configured with host override AND multi region; creating one resource per region`
    );
    return ok(
      regionInfo.regions.map(
        (region) =>
          new SpecResource({
            ...init,
            host: resolveRegionHost(regionInfo, region),
            region,
            regions: regionInfo.regions,
          })
      )
    );
  }

  /**
   * Declared properties in order, then one `<parent>_id` property per
   * ancestor, outermost first.
   */
  private buildResourceSchema(
    payloadSchema: Swagger.Schema,
    parentInfo: ParentResourceInfo | undefined
  ): AnalysisResult<SchemaDefinition> {
    const schema = buildSchemaDefinition(payloadSchema, {
      definitions: this.document.definitions ?? {},
      maxDepth: this.configuration["schema.maxDepth"],
      depth: 0,
    });
    if (!schema.success || parentInfo === undefined) return schema;

    return ok(
      schema.data.withProperties(
        parentInfo.parentResourceNames.map((parent) =>
          createParentIdProperty(`${parent}_id`)
        )
      )
    );
  }

  /**
   * Every ancestor instance and root path must be declared, and no
   * ancestor may be excluded.
   */
  private validateSubResourceTerraformCompliance(
    rootPath: string,
    parentInfo: ParentResourceInfo | undefined
  ): AnalysisResult<void> {
    if (parentInfo === undefined) return ok(undefined);

    for (const instancePath of parentInfo.parentInstancePaths) {
      if (!this.classifier.pathExists(instancePath).success) {
        return fail(
          "parentMissing",
          `subresource with path '${rootPath}' is missing parent path instance definition '${instancePath}'`
        );
      }
    }
    for (const parentRootPath of parentInfo.parentRootPaths) {
      const parent = this.classifier.pathExists(parentRootPath);
      if (!parent.success) {
        return fail(
          "parentMissing",
          `subresource with path '${rootPath}' is missing parent root path definition '${parentRootPath}'`
        );
      }
      if (this.classifier.isExcluded(parent.data.item)) {
        return fail(
          "parentExcluded",
          `subresource with path '${rootPath}' contains a parent ${parentRootPath} that is marked as ignored, therefore ignoring the subresource too`
        );
      }
    }
    return ok(undefined);
  }
}

function createOperations(
  endpoint: CompliantEndpoint,
  timeouts: ResourceTimeouts
): AnalysisResult<ResourceOperations> {
  const { rootPathItem, instancePathItem } = endpoint;
  const operation = (
    op: Swagger.Operation,
    timeout: number | undefined
  ): ResourceOperation => ({
    operation: op,
    responses: getResponsesPolling(op),
    timeout,
  });

  if (!rootPathItem.post || !instancePathItem.get) {
    return fail(
      "missingPostOperation",
      `resource '${endpoint.rootPath}' is missing its POST or GET operation`
    );
  }
  return ok({
    post: operation(rootPathItem.post, timeouts.create),
    get: operation(instancePathItem.get, timeouts.read),
    put: instancePathItem.put && operation(instancePathItem.put, timeouts.update),
    delete:
      instancePathItem.delete &&
      operation(instancePathItem.delete, timeouts.delete),
  });
}
