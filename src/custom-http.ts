/**
 * Describes the outbound HTTP request of a `@custom` field resolver.
 * Sending the request is left to the caller.
 *
 * In BATCH mode one request covers several parent objects: the body is an
 * array holding the template substituted once per parent, in order.
 */

import { MappingError } from "./errors.js";
import type { CompositeType, CustomHttpConfig, FieldDefinition, HttpMethod } from "./schema-model.js";
import { parseBodyTemplate } from "./template/body-template.js";
import type { ParsedBodyTemplate, TemplateValue } from "./template/body-template.js";
import { substituteVarsInBody, substituteVarsInURL, urlVariables } from "./template/substitute.js";
import type { VariableMap } from "./template/substitute.js";

export interface HttpRequestSpec {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export type IncomingHeaders = Readonly<Record<string, string | undefined>>;

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function headerValue(headers: IncomingHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) return value;
  }
  return undefined;
}

export class CustomRequestBuilder {
  private readonly template: Readonly<ParsedBodyTemplate>;
  readonly urlVariables: ReadonlySet<string>;
  readonly requiredVariables: ReadonlySet<string>;

  constructor(readonly config: CustomHttpConfig) {
    // Parsed once; every build substitutes into its own clone.
    this.template = deepFreeze(parseBodyTemplate(config.body ?? ""));
    this.urlVariables = urlVariables(config.url);
    this.requiredVariables = new Set([...this.template.variables, ...this.urlVariables]);
  }

  /** One parent's request. A BATCH field sends it as a batch of one. */
  build(variables: VariableMap, incomingHeaders: IncomingHeaders = {}): HttpRequestSpec {
    if (this.config.mode === "BATCH") {
      return this.buildBatch([variables], incomingHeaders);
    }

    const request = this.request(substituteVarsInURL(this.config.url, variables), incomingHeaders);
    const body = this.substituteBody(variables);
    if (body !== undefined) {
      request.headers["Content-Type"] = "application/json";
      request.body = JSON.stringify(body);
    }
    return request;
  }

  /** One request for every parent in `variablesList`, bodies in the same order. */
  buildBatch(
    variablesList: readonly VariableMap[],
    incomingHeaders: IncomingHeaders = {}
  ): HttpRequestSpec {
    const request = this.request(substituteVarsInURL(this.config.url, {}), incomingHeaders);
    if (this.template.body !== undefined) {
      const bodies = variablesList.map((variables) => this.substituteBody(variables) ?? null);
      request.headers["Content-Type"] = "application/json";
      request.body = JSON.stringify(bodies);
    }
    return request;
  }

  private request(url: string, incomingHeaders: IncomingHeaders): HttpRequestSpec {
    const request: HttpRequestSpec = { method: this.config.method, url, headers: {} };
    for (const name of this.config.forwardHeaders) {
      const value = headerValue(incomingHeaders, name);
      if (value !== undefined) request.headers[name] = value;
    }
    return request;
  }

  private substituteBody(variables: VariableMap): TemplateValue | undefined {
    const { body, refs } = this.template;
    if (body === undefined) return undefined;
    return substituteVarsInBody(structuredClone(body), variables, refs);
  }
}

/**
 * Build the request builder for a `@custom` field, checking that each
 * variable it uses is an argument of the field or, outside the root
 * operation types, a field of the parent type.
 */
export function customRequestBuilder(
  parent: CompositeType,
  field: FieldDefinition,
  isRootType: boolean
): CustomRequestBuilder | undefined {
  const config = field.directives.custom;
  if (!config) return undefined;

  const builder = new CustomRequestBuilder(config);
  const invalid = (reason: string): MappingError =>
    new MappingError({
      kind: "invalid-custom-directive",
      typeName: parent.name,
      fieldName: field.name,
      reason,
    });

  if (config.mode === "BATCH") {
    if (isRootType) {
      throw invalid("BATCH mode is only allowed on fields of non-root types");
    }
    const [urlVariable] = builder.urlVariables;
    if (urlVariable !== undefined) {
      throw invalid(`a BATCH url cannot use variables, found $${urlVariable}`);
    }
  }

  const available = new Set(field.args.map((a) => a.name));
  if (!isRootType) {
    for (const f of parent.fields) available.add(f.name);
  }

  for (const name of builder.requiredVariables) {
    if (!available.has(name)) {
      const source = isRootType
        ? "an argument"
        : `an argument or a field of ${parent.name}`;
      throw invalid(`variable $${name} is not ${source}`);
    }
  }
  return builder;
}
