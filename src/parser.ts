/**
 * GraphQL schema parser using the `graphql` npm package.
 * Completes interface inheritance and produces an internal SchemaModel.
 */

import {
  buildASTSchema,
  getNamedType,
  isEnumType,
  isInterfaceType,
  isListType,
  isNonNullType,
  isObjectType,
  isScalarType,
  Kind,
  parse,
} from "graphql";
import type {
  DocumentNode,
  FieldDefinitionNode,
  GraphQLInterfaceType,
  GraphQLObjectType,
  GraphQLType,
  InterfaceTypeDefinitionNode,
  ObjectTypeDefinitionNode,
} from "graphql";

import { extractDgraphType, extractFieldDirectives, missingSupportDefinitions } from "./directives.js";
import { MappingError } from "./errors.js";
import { listOf, named, nonNull } from "./schema-model.js";
import type {
  CompositeType,
  EnumType,
  FieldDefinition,
  SchemaModel,
  TypeRef,
} from "./schema-model.js";

const BUILTIN_SCALARS = ["String", "Int", "Float", "Boolean", "ID"];

type CompositeDefinitionNode = ObjectTypeDefinitionNode | InterfaceTypeDefinitionNode;

/**
 * Parse a GraphQL schema string into a SchemaModel.
 */
export function parseSchema(schemaSource: string): SchemaModel {
  const document = completeInterfaceFields(parse(schemaSource));
  const support = missingSupportDefinitions(document);
  const schema = buildASTSchema({
    ...document,
    definitions: [...support.definitions, ...document.definitions],
  });

  const model: SchemaModel = {
    types: new Map(),
    rootTypes: new Set(),
    customScalars: new Set(),
  };

  for (const root of [
    schema.getQueryType(),
    schema.getMutationType(),
    schema.getSubscriptionType(),
  ]) {
    if (root) model.rootTypes.add(root.name);
  }

  const typeMap = schema.getTypeMap();
  for (const [typeName, type] of Object.entries(typeMap)) {
    // Skip introspection, built-in and support types
    if (typeName.startsWith("__")) continue;
    if (BUILTIN_SCALARS.includes(typeName)) continue;
    if (support.names.has(typeName)) continue;

    if (isObjectType(type)) {
      model.types.set(typeName, extractCompositeType(type, "object"));
    } else if (isInterfaceType(type)) {
      model.types.set(typeName, extractCompositeType(type, "interface"));
    } else if (isEnumType(type)) {
      model.types.set(typeName, extractEnumType(type.name, type.getValues()));
    } else if (isScalarType(type)) {
      model.customScalars.add(typeName);
    }
  }

  return model;
}

/**
 * Copy the fields of implemented interfaces into every implementing type
 * that does not declare them itself. Inherited fields come first, in
 * interface declaration order.
 */
export function completeInterfaceFields(document: DocumentNode): DocumentNode {
  const interfaces = new Map<string, InterfaceTypeDefinitionNode>();
  for (const def of document.definitions) {
    if (def.kind === Kind.INTERFACE_TYPE_DEFINITION) {
      interfaces.set(def.name.value, def);
    }
  }

  const completed = new Map<string, readonly FieldDefinitionNode[]>();
  const visiting = new Set<string>();

  const fieldsOf = (def: CompositeDefinitionNode): readonly FieldDefinitionNode[] => {
    const name = def.name.value;
    const cached = completed.get(name);
    if (cached) return cached;

    const own = def.fields ?? [];
    // Cyclic implementations are reported by schema validation; stop here.
    if (visiting.has(name)) return own;
    visiting.add(name);

    const seen = new Set(own.map((f) => f.name.value));
    const inherited: FieldDefinitionNode[] = [];
    for (const iface of def.interfaces ?? []) {
      const ifaceDef = interfaces.get(iface.name.value);
      if (!ifaceDef) continue;
      for (const field of fieldsOf(ifaceDef)) {
        if (seen.has(field.name.value)) continue;
        seen.add(field.name.value);
        inherited.push(field);
      }
    }

    visiting.delete(name);
    const fields = [...inherited, ...own];
    completed.set(name, fields);
    return fields;
  };

  return {
    ...document,
    definitions: document.definitions.map((def) => {
      if (
        def.kind === Kind.OBJECT_TYPE_DEFINITION ||
        def.kind === Kind.INTERFACE_TYPE_DEFINITION
      ) {
        return { ...def, fields: fieldsOf(def) };
      }
      return def;
    }),
  };
}

function extractCompositeType(
  type: GraphQLObjectType | GraphQLInterfaceType,
  kind: CompositeType["kind"]
): CompositeType {
  const interfaces = type.getInterfaces();
  const fields: FieldDefinition[] = [];

  for (const field of Object.values(type.getFields())) {
    const { directives, customError } = extractFieldDirectives(
      field.astNode?.directives
    );
    if (customError) {
      throw new MappingError({
        kind: "invalid-custom-directive",
        typeName: type.name,
        fieldName: field.name,
        reason: customError,
      });
    }

    const fieldDef: FieldDefinition = {
      name: field.name,
      type: graphqlTypeToTypeRef(field.type),
      args: field.args.map((arg) => ({
        name: arg.name,
        type: graphqlTypeToTypeRef(arg.type),
      })),
      directives,
    };

    const declaringInterface = interfaces.find((i) => field.name in i.getFields());
    if (declaringInterface) {
      fieldDef.inheritedFrom = declaringInterface.name;
    }

    fields.push(fieldDef);
  }

  const composite: CompositeType = {
    kind,
    name: type.name,
    fields,
    interfaces: interfaces.map((i) => i.name),
  };

  const dgraphType = extractDgraphType(type.astNode?.directives);
  if (dgraphType !== undefined) {
    composite.dgraphType = dgraphType;
  }

  return composite;
}

function extractEnumType(name: string, values: readonly { name: string }[]): EnumType {
  return {
    kind: "enum",
    name,
    values: values.map((v) => v.name),
  };
}

function graphqlTypeToTypeRef(type: GraphQLType): TypeRef {
  if (isNonNullType(type)) {
    return nonNull(graphqlTypeToTypeRef(type.ofType));
  }
  if (isListType(type)) {
    return listOf(graphqlTypeToTypeRef(type.ofType));
  }
  return named(getNamedType(type).name);
}
