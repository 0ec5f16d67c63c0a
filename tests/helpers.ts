import * as fs from "node:fs";

const fixturesDir = new URL("../fixtures/", import.meta.url);

export function readFixture(name: string): string {
  return fs.readFileSync(new URL(name, fixturesDir), "utf-8");
}

/** Build the nested Map shape of a PredicateMap from a plain object. */
export function predicateMap(
  expected: Record<string, Record<string, string>>
): Map<string, Map<string, string>> {
  return new Map(
    Object.entries(expected).map(
      ([typeName, fields]): [string, Map<string, string>] => [
        typeName,
        new Map(Object.entries(fields)),
      ]
    )
  );
}
