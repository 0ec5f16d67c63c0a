/**
 * A loaded schema: the type model plus everything compiled from it once at
 * load time. Instances are never modified; a reload builds a new one.
 */

import { CustomRequestBuilder, customRequestBuilder } from "./custom-http.js";
import { ensureNonNulls } from "./non-null.js";
import { parseSchema } from "./parser.js";
import { resolvePredicates } from "./predicates.js";
import type { PredicateMap } from "./predicates.js";
import { compositeTypes, isCompositeType } from "./schema-model.js";
import type { CompositeType, SchemaModel } from "./schema-model.js";

/** A composite type bound to the schema it was loaded from. */
export class TypeDefinition {
  constructor(
    readonly definition: CompositeType,
    private readonly predicates: ReadonlyMap<string, string>
  ) {}

  get name(): string {
    return this.definition.name;
  }

  predicate(fieldName: string): string | undefined {
    return this.predicates.get(fieldName);
  }

  ensureNonNulls(obj: Readonly<Record<string, unknown>>, exclude = ""): void {
    ensureNonNulls(this.definition, obj, exclude);
  }
}

export class Schema {
  private readonly customResolvers = new Map<string, CustomRequestBuilder>();

  private constructor(
    readonly model: SchemaModel,
    readonly predicates: PredicateMap
  ) {
    for (const type of compositeTypes(model)) {
      const isRoot = model.rootTypes.has(type.name);
      for (const field of type.fields) {
        const builder = customRequestBuilder(type, field, isRoot);
        if (builder) this.customResolvers.set(`${type.name}.${field.name}`, builder);
      }
    }
  }

  static fromModel(model: SchemaModel): Schema {
    return new Schema(model, resolvePredicates(model));
  }

  static fromSDL(schemaSource: string): Schema {
    return Schema.fromModel(parseSchema(schemaSource));
  }

  type(name: string): TypeDefinition | undefined {
    const type = this.model.types.get(name);
    if (!isCompositeType(type)) return undefined;
    return new TypeDefinition(type, this.predicates.get(name) ?? new Map());
  }

  predicate(typeName: string, fieldName: string): string | undefined {
    return this.predicates.get(typeName)?.get(fieldName);
  }

  customResolver(typeName: string, fieldName: string): CustomRequestBuilder | undefined {
    return this.customResolvers.get(`${typeName}.${fieldName}`);
  }
}

/**
 * Holds the schema currently in use. Readers take `store.schema` once per
 * request and keep that instance; `reload` swaps in a fully built one.
 */
export class SchemaStore {
  private current: Schema;

  constructor(initial: Schema) {
    this.current = initial;
  }

  static fromSDL(schemaSource: string): SchemaStore {
    return new SchemaStore(Schema.fromSDL(schemaSource));
  }

  get schema(): Schema {
    return this.current;
  }

  /** Load a new schema. On failure the error propagates and the current schema stays. */
  reload(schemaSource: string): Schema {
    const next = Schema.fromSDL(schemaSource);
    this.current = next;
    return next;
  }
}
