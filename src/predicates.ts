/**
 * Maps every GraphQL type and field onto the predicate it is stored under.
 *
 * Interfaces are resolved before the objects that implement them, so an
 * inherited field carries the interface's predicate unless the implementing
 * type re-declares it with a different `@dgraph(pred:)`.
 */

import {
  compositeTypes,
  hasIdentifier,
  isCompositeType,
  isIdentifierField,
} from "./schema-model.js";
import type { CompositeType, FieldDefinition, SchemaModel } from "./schema-model.js";

export type FieldPredicates = ReadonlyMap<string, string>;

export type PredicateMap = ReadonlyMap<string, FieldPredicates>;

export function updatePayloadName(typeName: string): string {
  return `Update${typeName}Payload`;
}

export function deletePayloadName(typeName: string): string {
  return `Delete${typeName}Payload`;
}

/** The predicate a field gets from its own directives and its type's override. */
export function fieldPredicate(type: CompositeType, field: FieldDefinition): string {
  if (field.directives.dgraphPred !== undefined) {
    return field.directives.dgraphPred;
  }
  return `${type.dgraphType ?? type.name}.${field.name}`;
}

function isStored(field: FieldDefinition): boolean {
  return !isIdentifierField(field) && field.directives.custom === undefined;
}

export function resolvePredicates(model: SchemaModel): PredicateMap {
  const resolved = new Map<string, Map<string, string>>();

  const resolveType = (type: CompositeType): Map<string, string> => {
    const done = resolved.get(type.name);
    if (done) return done;

    // Registered before recursing so an implementation cycle terminates.
    const fields = new Map<string, string>();
    resolved.set(type.name, fields);

    for (const field of type.fields) {
      if (!isStored(field)) continue;

      const parent = field.inheritedFrom
        ? model.types.get(field.inheritedFrom)
        : undefined;
      const inherited = isCompositeType(parent)
        ? resolveType(parent).get(field.name)
        : undefined;

      const own = field.directives.dgraphPred;
      fields.set(
        field.name,
        inherited !== undefined && (own === undefined || own === inherited)
          ? inherited
          : fieldPredicate(type, field)
      );
    }
    return fields;
  };

  const types = compositeTypes(model).filter((t) => !model.rootTypes.has(t.name));
  for (const type of types) {
    if (type.kind === "interface") resolveType(type);
  }
  for (const type of types) {
    if (type.kind === "object") resolveType(type);
  }

  const predicates = new Map<string, FieldPredicates>();
  for (const type of types) {
    const fields = resolved.get(type.name);
    if (!fields) continue;
    predicates.set(type.name, fields);
    if (hasIdentifier(type)) {
      predicates.set(updatePayloadName(type.name), new Map(fields));
      predicates.set(deletePayloadName(type.name), new Map(fields));
    }
  }
  return predicates;
}
