/**
 * Library entry point for programmatic use.
 *
 * Re-exports the pure functions of the mapping core. These have no Node.js
 * dependencies beyond the `graphql` npm package.
 */

export { parseSchema, completeInterfaceFields } from "./parser.js";
export { SUPPORT_SDL } from "./directives.js";

export {
  resolvePredicates,
  fieldPredicate,
  updatePayloadName,
  deletePayloadName,
} from "./predicates.js";
export type { PredicateMap, FieldPredicates } from "./predicates.js";

export { ensureNonNulls } from "./non-null.js";

export {
  parseBodyTemplate,
  toTemplateValue,
  isTemplateObject,
  variableName,
  VARIABLE_MARKER,
} from "./template/body-template.js";
export type {
  TemplateValue,
  TemplateObject,
  ParsedBodyTemplate,
  PathSegment,
  VariableRef,
} from "./template/body-template.js";

export {
  substituteVarsInBody,
  substituteVarsInURL,
  urlVariables,
  variableRefs,
} from "./template/substitute.js";
export type { VariableMap } from "./template/substitute.js";

export { CustomRequestBuilder, customRequestBuilder } from "./custom-http.js";
export type { HttpRequestSpec, IncomingHeaders } from "./custom-http.js";

export { Schema, SchemaStore, TypeDefinition } from "./schema.js";

export { MappingError, isMappingError, renderMessage } from "./errors.js";
export type { ErrorDetail, ErrorKind } from "./errors.js";

export type {
  SchemaModel,
  SchemaType,
  CompositeType,
  EnumType,
  FieldDefinition,
  FieldDirectives,
  ArgumentDefinition,
  CustomHttpConfig,
  CustomMode,
  HttpMethod,
  TypeRef,
} from "./schema-model.js";

export {
  nonNull,
  listOf,
  named,
  isNullable,
  getNamedType,
  printTypeRef,
  isIdentifierField,
  hasIdentifier,
  isCompositeType,
  compositeTypes,
  HTTP_METHODS,
  CUSTOM_MODES,
} from "./schema-model.js";
