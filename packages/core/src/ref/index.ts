import { Result, ok, err } from "../result/result.js";

export type RefError =
  | { type: "external"; ref: string }
  | { type: "invalidEscape"; ref: string; message: string }
  | { type: "unsupportedTarget"; ref: string };

/**
 * Decodes one reference token: `~1` is `/`, `~0` is `~`.
 */
function decodeToken(token: string): Result<string, string> {
  const invalid = /~(?![01])/.exec(token);
  if (invalid) {
    return err(`Invalid escape at position ${invalid.index}`);
  }
  return ok(token.replace(/~1/g, "/").replace(/~0/g, "~"));
}

export function isLocalRef(ref: string): boolean {
  return ref.startsWith("#");
}

/**
 * Splits a local ref such as `#/definitions/Pet` into its decoded segments.
 */
export function parseLocalRef(ref: string): Result<string[], RefError> {
  if (!isLocalRef(ref)) {
    return err({ type: "external", ref });
  }
  let fragment: string;
  try {
    fragment = decodeURIComponent(ref.slice(1));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err({ type: "invalidEscape", ref, message });
  }
  if (fragment === "") return ok([]);
  if (!fragment.startsWith("/")) {
    return err({ type: "unsupportedTarget", ref });
  }

  const segments: string[] = [];
  for (const raw of fragment.slice(1).split("/")) {
    const decoded = decodeToken(raw);
    if (!decoded.success) {
      return err({ type: "invalidEscape", ref, message: decoded.error });
    }
    segments.push(decoded.data);
  }
  return ok(segments);
}

/**
 * Returns the definition name a ref points at. Only refs into the
 * document's own `definitions` table are accepted.
 */
export function parseDefinitionRef(ref: string): Result<string, RefError> {
  const segments = parseLocalRef(ref);
  if (!segments.success) return segments;

  const [table, name, ...rest] = segments.data;
  if (table !== "definitions" || name === undefined || name === "" || rest.length > 0) {
    return err({ type: "unsupportedTarget", ref });
  }
  return ok(name);
}
