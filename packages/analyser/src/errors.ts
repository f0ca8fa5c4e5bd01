import { Result, err } from "@oapi-tf/core/result";

export type AnalysisErrorType =
  // path classification
  | "notInstancePath"
  | "missingGetOperation"
  | "missingRootPath"
  | "missingPostOperation"
  | "invalidBodyParameter"
  | "missingIdentifier"
  | "emptySchema"
  // schema resolution
  | "unexpandedRef"
  | "missingDefinition"
  | "unsupportedType"
  | "invalidArrayItems"
  | "invalidObject"
  | "maxDepthExceeded"
  | "propertyConflict"
  // naming and paths
  | "invalidResourcePath"
  | "pathParamsMismatch"
  // auxiliary metadata
  | "invalidDuration"
  | "missingRegionExtension"
  | "emptyRegionList"
  | "invalidRegion"
  | "invalidHost"
  // sub-resources
  | "parentMissing"
  | "parentExcluded";

export type AnalysisError = { type: AnalysisErrorType; message: string };

export type AnalysisResult<T> = Result<T, AnalysisError>;

export const fail = <T = never>(
  type: AnalysisErrorType,
  message: string
): AnalysisResult<T> => err({ type, message });

/**
 * Prefixes the message with `<context>: `, keeping the error type.
 */
export const withContext =
  (context: string) =>
  (error: AnalysisError): AnalysisError => ({
    type: error.type,
    message: `${context}: ${error.message}`,
  });
