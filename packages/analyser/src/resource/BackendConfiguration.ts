import { ok } from "@oapi-tf/core/result";
import { Swagger } from "@oapi-tf/core/swagger";
import { AnalysisResult, fail } from "../errors.js";
import {
  MultiRegionInfo,
  getMultiRegionInfo,
  resolveRegionHost,
} from "../analysis/multiRegion.js";

export const DEFAULT_SCHEME = "http";

/**
 * Where the API is served: host, base path and scheme of the document,
 * plus the region list when the host is region parametrized.
 */
export class BackendConfiguration {
  private constructor(
    readonly host: string,
    readonly basePath: string,
    readonly schemes: readonly string[],
    private readonly multiRegion: MultiRegionInfo | undefined
  ) {}

  static fromDocument(
    document: Swagger.Document
  ): AnalysisResult<BackendConfiguration> {
    const host = document.host ?? "";
    const multiRegion = getMultiRegionInfo(host || undefined, document);
    if (!multiRegion.success) return multiRegion;

    return ok(
      new BackendConfiguration(
        host,
        document.basePath ?? "",
        document.schemes ?? [],
        multiRegion.data
      )
    );
  }

  /**
   * `https` when offered, else the first declared scheme, else `http`.
   */
  get defaultScheme(): string {
    if (this.schemes.includes("https")) return "https";
    return this.schemes[0] ?? DEFAULT_SCHEME;
  }

  isMultiRegion(): boolean {
    return this.multiRegion !== undefined;
  }

  get regions(): readonly string[] {
    return this.multiRegion?.regions ?? [];
  }

  get defaultRegion(): string | undefined {
    return this.regions[0];
  }

  /**
   * The host to call. Region parametrized hosts need a region, the default
   * one is used when none is given.
   */
  getHost(region?: string): AnalysisResult<string> {
    if (!this.multiRegion) return ok(this.host);

    const selected = region ?? this.defaultRegion;
    if (selected === undefined || !this.regions.includes(selected)) {
      return fail(
        "invalidRegion",
        `property region value ${selected ?? ""} is not valid, please make sure the value is one of [${this.regions.join(" ")}]`
      );
    }
    return ok(resolveRegionHost(this.multiRegion, selected));
  }
}
