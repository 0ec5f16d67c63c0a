/**
 * Storage directives understood by the schema loader, and helpers to read
 * their arguments off AST nodes.
 */

import { parse, valueFromASTUntyped } from "graphql";
import type { ConstDirectiveNode, DefinitionNode, DocumentNode } from "graphql";

import { CUSTOM_MODES, HTTP_METHODS } from "./schema-model.js";
import type { CustomHttpConfig, CustomMode, FieldDirectives, HttpMethod } from "./schema-model.js";

export const SUPPORT_SDL = `
scalar DateTime

enum DgraphIndex {
  int
  int64
  float
  bool
  hash
  exact
  term
  fulltext
  trigram
  regexp
  year
  month
  day
  hour
}

enum HTTPMethod {
  GET
  POST
  PUT
  PATCH
  DELETE
}

enum Mode {
  SINGLE
  BATCH
}

input CustomHTTP {
  url: String!
  method: HTTPMethod!
  body: String
  forwardHeaders: [String!]
  mode: Mode
}

directive @dgraph(type: String, pred: String) on OBJECT | INTERFACE | FIELD_DEFINITION
directive @search(by: [DgraphIndex!]) on FIELD_DEFINITION
directive @hasInverse(field: String!) on FIELD_DEFINITION
directive @id on FIELD_DEFINITION
directive @custom(http: CustomHTTP) on FIELD_DEFINITION
`;

let supportDocument: DocumentNode | undefined;

function definitionName(def: DefinitionNode): string | undefined {
  return "name" in def && def.name ? def.name.value : undefined;
}

/**
 * Support definitions the given document does not define itself.
 * Returns the definitions plus the names they introduce.
 */
export function missingSupportDefinitions(document: DocumentNode): {
  definitions: DefinitionNode[];
  names: Set<string>;
} {
  supportDocument ??= parse(SUPPORT_SDL);

  const defined = new Set<string>();
  for (const def of document.definitions) {
    const name = definitionName(def);
    if (name) defined.add(name);
  }

  const definitions: DefinitionNode[] = [];
  const names = new Set<string>();
  for (const def of supportDocument.definitions) {
    const name = definitionName(def);
    if (name && defined.has(name)) continue;
    definitions.push(def);
    if (name) names.add(name);
  }
  return { definitions, names };
}

/** Plain JS value of a directive argument, or undefined when absent. */
export function directiveArgument(
  directives: readonly ConstDirectiveNode[] | undefined,
  directiveName: string,
  argName: string
): unknown {
  const directive = directives?.find((d) => d.name.value === directiveName);
  const arg = directive?.arguments?.find((a) => a.name.value === argName);
  return arg ? valueFromASTUntyped(arg.value) : undefined;
}

function hasDirective(
  directives: readonly ConstDirectiveNode[] | undefined,
  directiveName: string
): boolean {
  return directives?.some((d) => d.name.value === directiveName) ?? false;
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asStringList(value: unknown): string[] | undefined {
  if (typeof value === "string") return [value]; // list coercion of a single item
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHttpMethod(value: unknown): value is HttpMethod {
  return HTTP_METHODS.some((m) => m === value);
}

function isCustomMode(value: unknown): value is CustomMode {
  return CUSTOM_MODES.some((m) => m === value);
}

/** `@dgraph(type: "...")` on an object or interface. */
export function extractDgraphType(
  directives: readonly ConstDirectiveNode[] | undefined
): string | undefined {
  return asString(directiveArgument(directives, "dgraph", "type"));
}

export type CustomHttpResult =
  | { ok: true; config: CustomHttpConfig }
  | { ok: false; reason: string };

function extractCustomHttp(value: unknown): CustomHttpResult {
  if (!isRecord(value)) {
    return { ok: false, reason: "@custom requires an http argument" };
  }
  const url = asString(value.url);
  if (!url) {
    return { ok: false, reason: "@custom http requires a url" };
  }
  const method = value.method;
  if (!isHttpMethod(method)) {
    return {
      ok: false,
      reason: `@custom http has unsupported method ${String(method)}`,
    };
  }

  const mode = value.mode ?? "SINGLE";
  if (!isCustomMode(mode)) {
    return { ok: false, reason: `@custom http has unsupported mode ${String(mode)}` };
  }

  const config: CustomHttpConfig = {
    url,
    method,
    forwardHeaders: asStringList(value.forwardHeaders) ?? [],
    mode,
  };
  const body = asString(value.body);
  if (body !== undefined) {
    config.body = body;
  }
  return { ok: true, config };
}

/**
 * Field-level directives. A malformed @custom is returned separately so the
 * caller can report it with the owning type and field names.
 */
export function extractFieldDirectives(
  directives: readonly ConstDirectiveNode[] | undefined
): { directives: FieldDirectives; customError?: string } {
  const result: FieldDirectives = { id: hasDirective(directives, "id") };

  if (hasDirective(directives, "search")) {
    result.search = asStringList(directiveArgument(directives, "search", "by")) ?? [];
  }

  const inverse = asString(directiveArgument(directives, "hasInverse", "field"));
  if (inverse !== undefined) {
    result.hasInverse = inverse;
  }

  const pred = asString(directiveArgument(directives, "dgraph", "pred"));
  if (pred !== undefined) {
    result.dgraphPred = pred;
  }

  if (hasDirective(directives, "custom")) {
    const custom = extractCustomHttp(directiveArgument(directives, "custom", "http"));
    if (!custom.ok) {
      return { directives: result, customError: custom.reason };
    }
    result.custom = custom.config;
  }

  return { directives: result };
}
