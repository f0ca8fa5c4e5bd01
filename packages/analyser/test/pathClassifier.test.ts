import { describe, it, expect } from "vitest";
import { Swagger } from "@oapi-tf/core/swagger";
import { PathClassifier } from "../src/analysis/PathClassifier.js";
import {
  createInstanceOperation,
  createOperation,
  createResourcePaths,
} from "./utils/testAnalyser.js";

const definitions: Swagger.Definitions = {
  User: {
    type: "object",
    required: ["name"],
    properties: {
      id: { type: "string", readOnly: true },
      name: { type: "string" },
    },
  },
  NoId: {
    type: "object",
    properties: { name: { type: "string" } },
  },
  Flagged: {
    type: "object",
    properties: {
      id: { type: "string" },
      uuid: { type: "string", "x-terraform-id": true },
    },
  },
  Empty: { type: "object", properties: {} },
};

const bodyParameter = (
  schema: Swagger.Schema | undefined
): Swagger.Parameter => ({ in: "body", name: "body", schema });

describe("PathClassifier", () => {
  describe("validateInstancePath", () => {
    it("should accept an instance path with GET", () => {
      const classifier = new PathClassifier(
        createResourcePaths("/users", "User"),
        definitions
      );
      expect(classifier.validateInstancePath("/users/{id}").success).toBe(true);
    });

    it("should reject a path that is not an instance path", () => {
      const classifier = new PathClassifier({}, definitions);
      expect(classifier.validateInstancePath("/users")).toEqual({
        success: false,
        error: {
          type: "notInstancePath",
          message: "path '/users' is not a resource instance path",
        },
      });
    });

    it("should require a GET operation", () => {
      const classifier = new PathClassifier(
        { "/users/{id}": { delete: createInstanceOperation("User") } },
        definitions
      );
      expect(classifier.validateInstancePath("/users/{id}")).toEqual({
        success: false,
        error: {
          type: "missingGetOperation",
          message: "resource instance path '/users/{id}' missing required GET operation",
        },
      });
    });
  });

  describe("findMatchingResourceRootPath", () => {
    it("should find a root declared with a trailing slash", () => {
      const classifier = new PathClassifier({ "/users/": {} }, definitions);
      expect(classifier.findMatchingResourceRootPath("/users/{id}")).toEqual({
        success: true,
        data: "/users/",
      });
    });

    it("should find a root declared without a trailing slash", () => {
      const classifier = new PathClassifier({ "/users": {} }, definitions);
      expect(classifier.findMatchingResourceRootPath("/users/{id}")).toEqual({
        success: true,
        data: "/users",
      });
    });

    it("should prefer the trailing slash variant when both exist", () => {
      const classifier = new PathClassifier(
        { "/users": {}, "/users/": {} },
        definitions
      );
      expect(classifier.findMatchingResourceRootPath("/users/{id}")).toEqual({
        success: true,
        data: "/users/",
      });
    });

    it("should fail when no root exists", () => {
      const classifier = new PathClassifier({}, definitions);
      expect(classifier.findMatchingResourceRootPath("/users/{id}")).toEqual({
        success: false,
        error: {
          type: "missingRootPath",
          message: "resource instance path '/users/{id}' missing resource root path",
        },
      });
    });
  });

  describe("validateRootPath", () => {
    it("should return the resolved payload schema", () => {
      const classifier = new PathClassifier(
        createResourcePaths("/users", "User"),
        definitions
      );
      const result = classifier.validateRootPath("/users/{id}");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.rootPath).toBe("/users");
        expect(result.data.payloadSchema).toBe(definitions.User);
      }
    });

    it("should accept an inline payload schema", () => {
      const inline = { type: "object", properties: { id: { type: "string" } } };
      const classifier = new PathClassifier(
        { "/users": { post: { parameters: [bodyParameter(inline)] } } },
        definitions
      );
      const result = classifier.validateRootPath("/users/{id}");
      expect(result.success && result.data.payloadSchema).toBe(inline);
    });

    it("should skip shared parameter references when finding the body", () => {
      const classifier = new PathClassifier(
        {
          "/users": {
            post: {
              parameters: [
                { $ref: "#/parameters/tenant" },
                bodyParameter({ $ref: "#/definitions/User" }),
              ],
            },
          },
        },
        definitions
      );
      const result = classifier.validateRootPath("/users/{id}");
      expect(result.success && result.data.payloadSchema).toBe(definitions.User);
    });

    it("should require a POST operation", () => {
      const classifier = new PathClassifier(
        { "/users": { get: createInstanceOperation("User") } },
        definitions
      );
      expect(classifier.validateRootPath("/users/{id}")).toEqual({
        success: false,
        error: {
          type: "missingPostOperation",
          message: "resource root path '/users' missing required POST operation",
        },
      });
    });

    it("should require a body parameter", () => {
      const classifier = new PathClassifier(
        { "/users": { post: { parameters: [] } } },
        definitions
      );
      expect(classifier.validateRootPath("/users/{id}")).toEqual({
        success: false,
        error: {
          type: "invalidBodyParameter",
          message:
            "resource root path '/users' POST operation validation error: resource root operation missing the body parameter",
        },
      });
    });

    it("should reject multiple body parameters", () => {
      const ref = { $ref: "#/definitions/User" };
      const classifier = new PathClassifier(
        {
          "/users": {
            post: { parameters: [bodyParameter(ref), bodyParameter(ref)] },
          },
        },
        definitions
      );
      const result = classifier.validateRootPath("/users/{id}");
      expect(!result.success && result.error.message).toBe(
        "resource root path '/users' POST operation validation error: resource root operation contains multiple 'body' parameters"
      );
    });

    it("should require a body schema", () => {
      const classifier = new PathClassifier(
        { "/users": { post: { parameters: [bodyParameter(undefined)] } } },
        definitions
      );
      const result = classifier.validateRootPath("/users/{id}");
      expect(!result.success && result.error.message).toBe(
        "resource root path '/users' POST operation validation error: resource root operation missing the schema for the POST operation body parameter"
      );
    });

    it("should fail when the body ref has no definition", () => {
      const classifier = new PathClassifier(
        { "/users": { post: createOperation("Missing") } },
        definitions
      );
      expect(classifier.validateRootPath("/users/{id}")).toEqual({
        success: false,
        error: {
          type: "missingDefinition",
          message:
            "resource root path '/users' POST operation validation error: missing schema definition in the swagger file with the supplied ref '#/definitions/Missing'",
        },
      });
    });

    it("should reject a schema without properties", () => {
      const classifier = new PathClassifier(
        { "/users": { post: createOperation("Empty") } },
        definitions
      );
      const result = classifier.validateRootPath("/users/{id}");
      expect(!result.success && result.error.type).toBe("emptySchema");
    });
  });

  describe("validateResourceSchemaDefinition", () => {
    const classifier = new PathClassifier({}, definitions);

    it("should accept a property named id", () => {
      expect(classifier.validateResourceSchemaDefinition(definitions.User)).toEqual({
        success: true,
        data: "id",
      });
    });

    it("should prefer the property flagged with x-terraform-id", () => {
      expect(
        classifier.validateResourceSchemaDefinition(definitions.Flagged)
      ).toEqual({ success: true, data: "uuid" });
    });

    it("should fail without an identifier", () => {
      expect(classifier.validateResourceSchemaDefinition(definitions.NoId)).toEqual({
        success: false,
        error: {
          type: "missingIdentifier",
          message:
            "resource schema is missing a property that uniquely identifies the resource, either a property named 'id' or a property with the extension 'x-terraform-id' set to true",
        },
      });
    });
  });

  describe("isEndPointFullyTerraformResourceCompliant", () => {
    it("should describe a compliant endpoint", () => {
      const paths = createResourcePaths("/v1/users", "User");
      const classifier = new PathClassifier(paths, definitions);
      const result =
        classifier.isEndPointFullyTerraformResourceCompliant("/v1/users/{id}");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.rootPath).toBe("/v1/users");
        expect(result.data.instancePath).toBe("/v1/users/{id}");
        expect(result.data.instancePathItem).toBe(paths["/v1/users/{id}"]);
      }
    });

    it("should short-circuit on the first failing check", () => {
      const classifier = new PathClassifier(
        createResourcePaths("/users", "NoId"),
        definitions
      );
      expect(
        classifier.isEndPointFullyTerraformResourceCompliant("/users")
      ).toMatchObject({ success: false, error: { type: "notInstancePath" } });
      expect(
        classifier.isEndPointFullyTerraformResourceCompliant("/users/{id}")
      ).toMatchObject({ success: false, error: { type: "missingIdentifier" } });
    });
  });

  describe("pathExists", () => {
    it("should fall back to the path with a trailing slash", () => {
      const classifier = new PathClassifier({ "/users/": {} }, definitions);
      expect(classifier.pathExists("/users")).toEqual({
        success: true,
        data: { path: "/users/", item: {} },
      });
      expect(classifier.pathExists("/groups").success).toBe(false);
    });
  });
});
