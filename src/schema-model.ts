/**
 * Internal type model extracted from a GraphQL schema.
 * Represents the types and storage directives needed for predicate mapping.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
];

/** SINGLE sends one request per parent object; BATCH one request for all of them. */
export type CustomMode = "SINGLE" | "BATCH";

export const CUSTOM_MODES: readonly CustomMode[] = ["SINGLE", "BATCH"];

/** Decoded `@custom(http: {...})` argument. */
export interface CustomHttpConfig {
  url: string;
  method: HttpMethod;
  body?: string;
  forwardHeaders: string[];
  mode: CustomMode;
}

export interface FieldDirectives {
  search?: string[]; // from @search(by: [...]); empty for a bare @search
  hasInverse?: string; // from @hasInverse(field: ...)
  dgraphPred?: string; // from @dgraph(pred: "...")
  id: boolean; // @id
  custom?: CustomHttpConfig;
}

export type TypeRef =
  | { kind: "Named"; name: string }
  | { kind: "NonNull"; ofType: TypeRef }
  | { kind: "List"; ofType: TypeRef };

export interface ArgumentDefinition {
  name: string;
  type: TypeRef;
}

export interface FieldDefinition {
  name: string;
  type: TypeRef;
  args: ArgumentDefinition[];
  directives: FieldDirectives;
  inheritedFrom?: string; // first implemented interface declaring this field
}

export interface CompositeType {
  kind: "object" | "interface";
  name: string;
  fields: FieldDefinition[];
  interfaces: string[];
  dgraphType?: string; // from @dgraph(type: "...")
}

export interface EnumType {
  kind: "enum";
  name: string;
  values: string[];
}

export type SchemaType = CompositeType | EnumType;

export interface SchemaModel {
  types: Map<string, SchemaType>;
  rootTypes: Set<string>; // Query, Mutation, Subscription names present in the schema
  customScalars: Set<string>;
}

/** Helper to create a non-null type ref */
export function nonNull(inner: TypeRef): TypeRef {
  return { kind: "NonNull", ofType: inner };
}

/** Helper to create a list type ref */
export function listOf(inner: TypeRef): TypeRef {
  return { kind: "List", ofType: inner };
}

/** Helper to create a named type ref */
export function named(name: string): TypeRef {
  return { kind: "Named", name };
}

/** Check if a type ref is nullable (not wrapped in NonNull) */
export function isNullable(typeRef: TypeRef): boolean {
  return typeRef.kind !== "NonNull";
}

/** Get the leaf named type from a type ref */
export function getNamedType(typeRef: TypeRef): string {
  switch (typeRef.kind) {
    case "Named":
      return typeRef.name;
    case "NonNull":
    case "List":
      return getNamedType(typeRef.ofType);
  }
}

/** Render a type ref back into SDL notation, e.g. `[Post!]!` */
export function printTypeRef(typeRef: TypeRef): string {
  switch (typeRef.kind) {
    case "Named":
      return typeRef.name;
    case "NonNull":
      return `${printTypeRef(typeRef.ofType)}!`;
    case "List":
      return `[${printTypeRef(typeRef.ofType)}]`;
  }
}

/** Identifier fields are `ID` typed; they map to the node uid, not a predicate. */
export function isIdentifierField(field: FieldDefinition): boolean {
  return getNamedType(field.type) === "ID";
}

/** A type has an identifier when it can be addressed by update/delete mutations. */
export function hasIdentifier(type: CompositeType): boolean {
  return type.fields.some((f) => isIdentifierField(f) || f.directives.id);
}

export function isCompositeType(
  type: SchemaType | undefined
): type is CompositeType {
  return type !== undefined && type.kind !== "enum";
}

export function compositeTypes(model: SchemaModel): CompositeType[] {
  return [...model.types.values()].filter(isCompositeType);
}
