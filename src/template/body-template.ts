/**
 * Parser for custom-resolver HTTP body templates.
 *
 * A template is JSON-like text with bare keys and `$variable` values:
 *
 *   { author: $id, post: { id: $postID, tags: [$tag] } }
 *
 * The text is rewritten into JSON (quoting bare words and variables) and then
 * decoded. Variables survive decoding as `"$name"` string leaves, and the
 * parser records where each one sits so that a quoted `"$name"` literal is
 * never mistaken for a variable.
 */

import { MappingError } from "../errors.js";

export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export type TemplateObject = { [key: string]: TemplateValue };

export type PathSegment = string | number;

/** A variable leaf: object keys and array indexes leading to it, and its name. */
export interface VariableRef {
  path: readonly PathSegment[];
  name: string;
}

export interface ParsedBodyTemplate {
  body: TemplateValue | undefined; // undefined for an empty template
  variables: Set<string>;
  refs: VariableRef[]; // in document order
}

type Frame = { kind: "object"; key: string } | { kind: "array"; index: number };

export const VARIABLE_MARKER = "$";

const VARIABLE_TOKEN = /^\$([A-Za-z_][A-Za-z0-9_]*)$/;

/** Name of the variable a leaf refers to, or undefined for a plain string. */
export function variableName(value: string): string | undefined {
  return VARIABLE_TOKEN.exec(value)?.[1];
}

function isWordChar(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

function isIdentifierStart(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z_]$/.test(ch);
}

function isWhitespace(ch: string): boolean {
  return /^\s$/.test(ch);
}

function hasPrefix(path: readonly PathSegment[], prefix: readonly PathSegment[]): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => path[i] === segment);
}

/** A malformed literal fails the full decode later, so its key is never used. */
function decodeKey(literal: string): string {
  try {
    const key: unknown = JSON.parse(literal);
    return typeof key === "string" ? key : literal;
  } catch {
    return literal;
  }
}

/** Bare words that stay unquoted when they appear as values. */
function isLiteral(word: string): boolean {
  return (
    word === "true" ||
    word === "false" ||
    word === "null" ||
    /^(0|[1-9][0-9]*)$/.test(word)
  );
}

export function parseBodyTemplate(template: string): ParsedBodyTemplate {
  if (template.trim() === "") {
    return { body: undefined, variables: new Set(), refs: [] };
  }

  const chars = Array.from(template);
  const out: string[] = [];
  const frames: Frame[] = [];
  let refs: VariableRef[] = [];
  let depth = 0;
  let unbalanced = false;
  let afterColon = false;

  const top = (): Frame | undefined => frames[frames.length - 1];
  const inKeyPosition = (): boolean => top()?.kind === "object" && !afterColon;
  const currentPath = (): PathSegment[] =>
    frames.map((f) => (f.kind === "object" ? f.key : f.index));

  // A repeated key replaces the earlier value, variables included.
  const startValue = (): PathSegment[] => {
    const path = currentPath();
    if (top()?.kind === "object") {
      refs = refs.filter((ref) => !hasPrefix(ref.path, path));
    }
    return path;
  };

  const setKey = (key: string): void => {
    const frame = top();
    if (frame?.kind === "object") frame.key = key;
  };

  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    switch (ch) {
      case "{":
      case "[":
        startValue();
        if (ch === "{") depth++;
        frames.push(ch === "{" ? { kind: "object", key: "" } : { kind: "array", index: 0 });
        out.push(ch);
        afterColon = false;
        i++;
        continue;
      case "}":
      case "]":
        if (ch === "}") {
          depth--;
          if (depth < 0) unbalanced = true;
        }
        frames.pop();
        out.push(ch);
        afterColon = false;
        i++;
        continue;
      case ":":
        out.push(ch);
        afterColon = true;
        i++;
        continue;
      case ",": {
        const frame = top();
        if (frame?.kind === "array") frame.index++;
        out.push(ch);
        afterColon = false;
        i++;
        continue;
      }
      case '"': {
        // Quoted strings pass through untouched, escapes included.
        let j = i + 1;
        while (j < chars.length && chars[j] !== '"') {
          j += chars[j] === "\\" ? 2 : 1;
        }
        const literal = chars.slice(i, j + 1).join("");
        if (inKeyPosition()) setKey(decodeKey(literal));
        else startValue();
        out.push(literal);
        afterColon = false;
        i = j + 1;
        continue;
      }
      case VARIABLE_MARKER: {
        if (!isIdentifierStart(chars[i + 1])) {
          throw new MappingError({ kind: "invalid-character", char: ch });
        }
        let j = i + 1;
        while (j < chars.length && isWordChar(chars[j])) j++;
        const name = chars.slice(i + 1, j).join("");
        // A `$name` key is an ordinary key; only values are substituted.
        if (inKeyPosition()) setKey(VARIABLE_MARKER + name);
        else refs.push({ path: startValue(), name });
        out.push(JSON.stringify(VARIABLE_MARKER + name));
        afterColon = false;
        i = j;
        continue;
      }
    }

    if (!isWordChar(ch)) {
      throw new MappingError({ kind: "invalid-character", char: ch });
    }

    let j = i;
    while (j < chars.length && isWordChar(chars[j])) j++;
    const word = chars.slice(i, j).join("");
    const isValue = !inKeyPosition();
    if (isValue) startValue();
    else setKey(word);
    out.push(isValue && isLiteral(word) ? word : JSON.stringify(word));
    afterColon = false;
    i = j;
  }

  if (unbalanced || depth !== 0) {
    throw new MappingError({ kind: "unbalanced-braces" });
  }

  const rewritten = out.join("");
  let decoded: unknown;
  try {
    decoded = JSON.parse(rewritten);
  } catch (err) {
    throw new MappingError({ kind: "malformed-template", rewritten }, { cause: err });
  }

  return {
    body: toTemplateValue(decoded),
    variables: new Set(refs.map((ref) => ref.name)),
    refs,
  };
}

/** Narrow decoded JSON into a TemplateValue tree. */
export function toTemplateValue(value: unknown): TemplateValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toTemplateValue);
  }
  if (typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, child]): [string, TemplateValue] => [key, toTemplateValue(child)])
    );
  }
  throw new TypeError(`unsupported template value of type ${typeof value}`);
}

export function isTemplateObject(value: TemplateValue | undefined): value is TemplateObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
