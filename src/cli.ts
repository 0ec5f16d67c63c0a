/**
 * Command-line front end.
 *
 * Usage:
 *   graphql-predicate-mapping --schema ./schema.graphql [--type Post]
 *   graphql-predicate-mapping --template '{ author: $id }' [--vars '{"id":"0x1"}']
 *   graphql-predicate-mapping --url 'http://api/x/$id?q=$q' --vars '{"id":"0x1"}'
 *
 * With no --template or --url, the schema's predicate map is printed. When
 * --schema is omitted it defaults to "schema.graphql" in the current directory.
 */

import { Schema } from "./schema.js";
import { isTemplateObject, parseBodyTemplate, toTemplateValue } from "./template/body-template.js";
import { substituteVarsInBody, substituteVarsInURL } from "./template/substitute.js";
import type { VariableMap } from "./template/substitute.js";

export const DEFAULT_SCHEMA = "schema.graphql";

export interface CliArgs {
  schema: string;
  type?: string;
  template?: string;
  url?: string;
  vars?: VariableMap;
}

function parseVars(source: string): VariableMap {
  let decoded: unknown;
  try {
    decoded = JSON.parse(source);
  } catch (err) {
    throw new Error(`--vars must be a JSON object, got ${source}`, { cause: err });
  }
  const value = toTemplateValue(decoded);
  if (!isTemplateObject(value)) {
    throw new Error(`--vars must be a JSON object, got ${source}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { schema: "" };

  const valueOf = (i: number): string => {
    const value = argv[i + 1];
    if (value === undefined) {
      throw new Error(`${argv[i]} requires a value`);
    }
    return value;
  };

  let i = 0;
  while (i < argv.length) {
    switch (argv[i]) {
      case "--schema":
        args.schema = valueOf(i);
        break;
      case "--type":
        args.type = valueOf(i);
        break;
      case "--template":
        args.template = valueOf(i);
        break;
      case "--url":
        args.url = valueOf(i);
        break;
      case "--vars":
        args.vars = parseVars(valueOf(i));
        break;
      default:
        throw new Error(`Unknown option: ${argv[i]}`);
    }
    i += 2;
  }

  if (args.template === undefined && args.url === undefined && !args.schema) {
    args.schema = DEFAULT_SCHEMA;
  }

  return args;
}

function predicatesToJSON(schema: Schema, typeName?: string): Record<string, Record<string, string>> {
  const out: Record<string, Record<string, string>> = {};
  for (const [name, fields] of schema.predicates) {
    if (typeName !== undefined && name !== typeName) continue;
    out[name] = Object.fromEntries(fields);
  }
  if (typeName !== undefined && !(typeName in out)) {
    throw new Error(`type ${typeName} has no predicates in the schema`);
  }
  return out;
}

/**
 * Execute a parsed command line and return the JSON text to print.
 * `readFile` is injected so the command can run without touching disk.
 */
export function run(args: CliArgs, readFile: (path: string) => string): string {
  if (args.template === undefined && args.url === undefined) {
    const schema = Schema.fromSDL(readFile(args.schema));
    return JSON.stringify(predicatesToJSON(schema, args.type), null, 2);
  }

  const result: Record<string, unknown> = {};

  if (args.template !== undefined) {
    const { body, variables, refs } = parseBodyTemplate(args.template);
    result.variables = [...variables].sort();
    result.body =
      args.vars && body !== undefined ? substituteVarsInBody(body, args.vars, refs) : body ?? null;
  }

  if (args.url !== undefined) {
    result.url = substituteVarsInURL(args.url, args.vars ?? {});
  }

  return JSON.stringify(result, null, 2);
}
