import { MappingError } from "./errors.js";
import { isNullable } from "./schema-model.js";
import type { CompositeType } from "./schema-model.js";

/**
 * Check that `obj` carries a value for every non-null field of `type`,
 * except `exclude`. Fields are checked in declaration order and the first
 * missing one is reported.
 */
export function ensureNonNulls(
  type: CompositeType,
  obj: Readonly<Record<string, unknown>>,
  exclude = ""
): void {
  for (const field of type.fields) {
    if (isNullable(field.type) || field.name === exclude) continue;

    const value = Object.hasOwn(obj, field.name) ? obj[field.name] : undefined;
    if (value === undefined || value === null) {
      throw new MappingError({
        kind: "missing-field",
        typeName: type.name,
        fieldName: field.name,
      });
    }
  }
}
