/**
 * Substitution of request-time variables into body templates and URLs.
 *
 * Bodies and URL paths require every variable they reference. URL query
 * parameters are optional: an absent variable drops its parameter and a
 * null one keeps the key with an empty value.
 */

import { MappingError } from "../errors.js";
import { VARIABLE_MARKER, isTemplateObject, variableName } from "./body-template.js";
import type { PathSegment, TemplateValue, VariableRef } from "./body-template.js";

export type VariableMap = Readonly<Record<string, TemplateValue | undefined>>;

const VARIABLE_IN_TEXT = /\$([A-Za-z_][A-Za-z0-9_]*)/g;

function lookup(variables: VariableMap, name: string): { found: boolean; value: TemplateValue } {
  const value = Object.hasOwn(variables, name) ? variables[name] : undefined;
  return value === undefined ? { found: false, value: null } : { found: true, value };
}

function missingVariable(name: string): MappingError {
  return new MappingError({ kind: "missing-variable", token: VARIABLE_MARKER + name });
}

/** Every `$name` string leaf of `value`, in traversal order. */
export function variableRefs(value: TemplateValue, path: PathSegment[] = []): VariableRef[] {
  if (typeof value === "string") {
    const name = variableName(value);
    return name === undefined ? [] : [{ path, name }];
  }
  if (Array.isArray(value)) {
    return value.flatMap((child, i) => variableRefs(child, [...path, i]));
  }
  if (isTemplateObject(value)) {
    return Object.entries(value).flatMap(([key, child]) => variableRefs(child, [...path, key]));
  }
  return [];
}

function childAt(container: TemplateValue, segment: PathSegment): TemplateValue | undefined {
  if (Array.isArray(container) && typeof segment === "number") {
    return container[segment];
  }
  if (isTemplateObject(container) && typeof segment === "string" && Object.hasOwn(container, segment)) {
    return container[segment];
  }
  return undefined;
}

function replaceAt(root: TemplateValue, path: readonly PathSegment[], value: TemplateValue): TemplateValue {
  if (path.length === 0) return value;

  let parent: TemplateValue | undefined = root;
  for (const segment of path.slice(0, -1)) {
    parent = parent === undefined ? undefined : childAt(parent, segment);
  }
  const last = path[path.length - 1];
  if (Array.isArray(parent) && typeof last === "number" && last < parent.length) {
    parent[last] = value;
  } else if (isTemplateObject(parent) && typeof last === "string" && Object.hasOwn(parent, last)) {
    parent[last] = value;
  } else {
    throw new RangeError(`no template value at ${JSON.stringify(path)}`);
  }
  return root;
}

/**
 * Replace the variable leaves of `body` with the variables' values, keeping
 * their types. `refs` defaults to every `$name` string leaf; pass the refs
 * recorded by `parseBodyTemplate` so quoted `"$name"` literals stay as they
 * are. Objects and arrays are updated in place; the root is returned since a
 * bare variable root is replaced rather than mutated. Nothing is changed when
 * a variable is missing.
 */
export function substituteVarsInBody(
  body: TemplateValue,
  variables: VariableMap,
  refs: readonly VariableRef[] = variableRefs(body)
): TemplateValue {
  const missing = refs.find((ref) => !lookup(variables, ref.name).found);
  if (missing !== undefined) {
    throw missingVariable(missing.name);
  }
  let root = body;
  for (const ref of refs) {
    root = replaceAt(root, ref.path, lookup(variables, ref.name).value);
  }
  return root;
}

function stringifyVariable(value: TemplateValue): string {
  if (value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function parseURL(rawURL: string): URL {
  try {
    return new URL(rawURL);
  } catch (err) {
    throw new MappingError({ kind: "invalid-url", url: rawURL }, { cause: err });
  }
}

/**
 * Names of the variables a URL template substitutes: every `$name` in the
 * path and every query value that is exactly `$name`.
 */
export function urlVariables(rawURL: string): Set<string> {
  const url = parseURL(rawURL);
  const names = new Set(Array.from(url.pathname.matchAll(VARIABLE_IN_TEXT), (m) => m[1]));
  for (const value of url.searchParams.values()) {
    const name = variableName(value);
    if (name !== undefined) names.add(name);
  }
  return names;
}

export function substituteVarsInURL(rawURL: string, variables: VariableMap): string {
  const url = parseURL(rawURL);
  url.pathname = url.pathname
    .split("/")
    .map((segment) =>
      segment.replace(VARIABLE_IN_TEXT, (_token, name: string) => {
        const { found, value } = lookup(variables, name);
        if (!found) throw missingVariable(name);
        return encodeURIComponent(stringifyVariable(value));
      })
    )
    .join("/");

  const retained: [string, string][] = [];
  for (const [key, value] of url.searchParams) {
    const name = variableName(value);
    if (name === undefined) {
      retained.push([key, value]);
      continue;
    }
    const variable = lookup(variables, name);
    if (variable.found) {
      retained.push([key, stringifyVariable(variable.value)]);
    }
  }
  url.search = new URLSearchParams(retained).toString();

  return url.toString();
}
