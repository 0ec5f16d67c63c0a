/**
 * Errors raised by the mapping core.
 *
 * Each failure carries a tagged `detail`; the human-readable message is
 * rendered from it by `renderMessage`.
 */

export type ErrorDetail =
  | { kind: "missing-field"; typeName: string; fieldName: string }
  | { kind: "missing-variable"; token: string }
  | { kind: "malformed-template"; rewritten: string }
  | { kind: "invalid-character"; char: string }
  | { kind: "unbalanced-braces" }
  | { kind: "invalid-url"; url: string }
  | {
      kind: "invalid-custom-directive";
      typeName: string;
      fieldName: string;
      reason: string;
    };

export type ErrorKind = ErrorDetail["kind"];

export function renderMessage(detail: ErrorDetail): string {
  switch (detail.kind) {
    case "missing-field":
      return `type ${detail.typeName} requires a value for field ${detail.fieldName}, but no value present`;
    case "missing-variable":
      return `couldn't find variable: ${detail.token} in variables map`;
    case "malformed-template":
      return `couldn't unmarshal HTTP body: ${detail.rewritten} as JSON`;
    case "invalid-character":
      return `invalid character: ${detail.char} while parsing body template`;
    case "unbalanced-braces":
      return "found unmatched curly braces while parsing body template";
    case "invalid-url":
      return `couldn't parse URL: ${detail.url}`;
    case "invalid-custom-directive":
      return `${detail.typeName}.${detail.fieldName}: ${detail.reason}`;
  }
}

export class MappingError extends Error {
  constructor(public readonly detail: ErrorDetail, options?: ErrorOptions) {
    super(renderMessage(detail), options);
    this.name = "MappingError";
  }

  get kind(): ErrorKind {
    return this.detail.kind;
  }
}

/** Narrow an unknown thrown value, optionally to one kind of detail. */
export function isMappingError<K extends ErrorKind>(
  err: unknown,
  kind?: K
): err is MappingError & { detail: Extract<ErrorDetail, { kind: K }> } {
  if (!(err instanceof MappingError)) return false;
  return kind === undefined || err.detail.kind === kind;
}
