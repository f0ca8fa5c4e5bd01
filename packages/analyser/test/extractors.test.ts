import { describe, it, expect } from "vitest";
import {
  getMultiRegionInfo,
  getMultiRegionKeyword,
  resolveRegionHost,
} from "../src/analysis/multiRegion.js";
import {
  getPollingConfiguration,
  getResponsesPolling,
} from "../src/analysis/polling.js";
import {
  getResourceTimeout,
  getResourceTimeouts,
  getTimeDuration,
} from "../src/analysis/timeouts.js";

describe("timeouts", () => {
  describe("getTimeDuration", () => {
    it.each([
      ["30s", 30000],
      ["20.5m", 1230000],
      ["1h", 3600000],
      [".5s", 500],
      ["0s", 0],
    ])("should convert %s to milliseconds", (value, expected) => {
      expect(getTimeDuration(value)).toEqual({ success: true, data: expected });
    });

    it.each(["", "-1s", "300ms", "1d", "1 h", "s"])(
      "should reject '%s'",
      (value) => {
        const result = getTimeDuration(value);
        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error.type).toBe("invalidDuration");
        expect(result.error.message).toMatch(
          new RegExp(`^invalid duration value: '${value}'\\.`)
        );
      }
    );
  });

  describe("getResourceTimeout", () => {
    it("should return undefined without the extension", () => {
      expect(getResourceTimeout({})).toEqual({ success: true, data: undefined });
      expect(getResourceTimeout(undefined)).toEqual({
        success: true,
        data: undefined,
      });
    });

    it("should ignore a timeout that is not a string", () => {
      expect(
        getResourceTimeout({ "x-terraform-resource-timeout": 30 })
      ).toEqual({ success: true, data: undefined });
    });

    it("should read each operation of the resource", () => {
      const result = getResourceTimeouts(
        { post: { "x-terraform-resource-timeout": "5m" } },
        {
          get: {},
          put: { "x-terraform-resource-timeout": "10s" },
          delete: { "x-terraform-resource-timeout": "1h" },
        }
      );
      expect(result).toEqual({
        success: true,
        data: { create: 300000, read: undefined, update: 10000, delete: 3600000 },
      });
    });

    it("should fail on the first malformed timeout", () => {
      const result = getResourceTimeouts(
        { post: {} },
        { get: {}, delete: { "x-terraform-resource-timeout": "soon" } }
      );
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toMatch(/^invalid duration value: 'soon'/);
      }
    });
  });
});

describe("polling", () => {
  it("should split the status lists", () => {
    expect(
      getPollingConfiguration({
        "x-terraform-resource-poll-enabled": true,
        "x-terraform-resource-poll-completed-statuses": "deployed, completed, done",
        "x-terraform-resource-poll-pending-statuses": "pending,,in_progress ",
      })
    ).toEqual({
      pollEnabled: true,
      targetStatuses: ["deployed", "completed", "done"],
      pendingStatuses: ["pending", "in_progress"],
    });
  });

  it("should default to no polling", () => {
    expect(getPollingConfiguration({ description: "ok" })).toEqual({
      pollEnabled: false,
      targetStatuses: [],
      pendingStatuses: [],
    });
  });

  it("should key responses by numeric status code", () => {
    const responses = getResponsesPolling({
      responses: {
        "202": { "x-terraform-resource-poll-enabled": true },
        "200": {},
        default: { "x-terraform-resource-poll-enabled": true },
      },
    });
    expect([...responses.keys()]).toEqual([200, 202]);
    expect(responses.get(202)?.pollEnabled).toBe(true);
    expect(responses.get(200)?.pollEnabled).toBe(false);
  });

  it("should return an empty map without responses", () => {
    expect(getResponsesPolling(undefined).size).toBe(0);
  });
});

describe("multi-region", () => {
  const document = { "x-terraform-resource-regions-region": "rst1, dub1" };

  it("should detect the host keyword", () => {
    expect(getMultiRegionKeyword("api.${region}.example.com")).toBe("region");
    expect(getMultiRegionKeyword("api.example.com")).toBeUndefined();
    expect(getMultiRegionKeyword("api.${}.example.com")).toBeUndefined();
  });

  it("should ignore hosts without a placeholder", () => {
    expect(getMultiRegionInfo(undefined, document)).toEqual({
      success: true,
      data: undefined,
    });
    expect(getMultiRegionInfo("api.example.com", document)).toEqual({
      success: true,
      data: undefined,
    });
  });

  it("should read the regions of the matching root extension", () => {
    const result = getMultiRegionInfo("api.${region}.example.com", document);
    expect(result).toEqual({
      success: true,
      data: {
        hostTemplate: "api.${region}.example.com",
        keyword: "region",
        regions: ["rst1", "dub1"],
      },
    });
    if (result.success && result.data) {
      expect(resolveRegionHost(result.data, "dub1")).toBe(
        "api.dub1.example.com"
      );
    }
  });

  it("should insert region names literally", () => {
    const info = {
      hostTemplate: "api.${region}.example.com",
      keyword: "region",
      regions: ["$&", "$'"],
    };
    expect(resolveRegionHost(info, "$&")).toBe("api.$&.example.com");
    expect(resolveRegionHost(info, "$'")).toBe("api.$'.example.com");
  });

  it("should fail when the root extension is missing", () => {
    expect(getMultiRegionInfo("api.${zone}.example.com", document)).toEqual({
      success: false,
      error: {
        type: "missingRegionExtension",
        message:
          "missing matching 'zone' root level region extension 'x-terraform-resource-regions-zone'",
      },
    });
  });

  it("should fail when the region list is empty", () => {
    expect(
      getMultiRegionInfo("api.${region}.example.com", {
        "x-terraform-resource-regions-region": " , ",
      })
    ).toEqual({
      success: false,
      error: {
        type: "emptyRegionList",
        message:
          "could not find any region for 'region' matching region extension x-terraform-resource-regions-region: ' , '",
      },
    });
  });
});
