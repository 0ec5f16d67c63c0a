import { describe, it } from "node:test";
import * as assert from "node:assert";
import { parseSchema } from "../src/parser.js";
import {
  deletePayloadName,
  resolvePredicates,
  updatePayloadName,
} from "../src/predicates.js";
import { predicateMap, readFixture } from "./helpers.js";

function withPayloads(
  entries: Record<string, Record<string, string>>,
  withoutIdentifier: string[] = []
): Record<string, Record<string, string>> {
  const out: Record<string, Record<string, string>> = {};
  for (const [typeName, fields] of Object.entries(entries)) {
    out[typeName] = fields;
    if (withoutIdentifier.includes(typeName)) continue;
    out[updatePayloadName(typeName)] = fields;
    out[deletePayloadName(typeName)] = fields;
  }
  return out;
}

describe("resolvePredicates", () => {
  it("should derive predicates from type names without directives", () => {
    const predicates = resolvePredicates(
      parseSchema(readFixture("without_directives.graphql"))
    );

    const author = {
      name: "Author.name",
      dob: "Author.dob",
      reputation: "Author.reputation",
      posts: "Author.posts",
    };
    const character = {
      name: "Character.name",
      appearsIn: "Character.appearsIn",
    };

    const expected = withPayloads(
      {
        Author: author,
        Post: { postType: "Post.postType", author: "Post.author" },
        Employee: { ename: "Employee.ename" },
        Character: character,
        Human: {
          ename: "Employee.ename",
          ...character,
          starships: "Human.starships",
          totalCredits: "Human.totalCredits",
        },
        Droid: { ...character, primaryFunction: "Droid.primaryFunction" },
        Starship: { name: "Starship.name", length: "Starship.length" },
      },
      ["Employee"]
    );

    assert.deepStrictEqual(predicates, predicateMap(expected));
  });

  it("should apply type and field overrides from @dgraph", () => {
    const predicates = resolvePredicates(
      parseSchema(readFixture("with_directives.graphql"))
    );

    const character = {
      name: "performance.character.name",
      appearsIn: "appears_in",
    };

    const expected = withPayloads(
      {
        Author: {
          name: "dgraph.author.name",
          dob: "dgraph.author.dob",
          reputation: "dgraph.author.reputation",
          posts: "dgraph.author.posts",
        },
        Post: { postType: "dgraph.post_type", author: "dgraph.post_author" },
        Employee: { ename: "dgraph.employee.en.ename" },
        Character: character,
        Human: {
          ename: "dgraph.employee.en.ename",
          ...character,
          starships: "Human.starships",
          totalCredits: "credits",
        },
        Droid: { ...character, primaryFunction: "roboDroid.primaryFunction" },
        Starship: { name: "star.ship.name", length: "star.ship.length" },
      },
      ["Employee"]
    );

    assert.deepStrictEqual(predicates, predicateMap(expected));
  });

  it("should use a field's @dgraph(pred) verbatim", () => {
    const withPred = resolvePredicates(
      parseSchema(`type Post {
        id: ID!
        postType: String @dgraph(pred: "dgraph.post_type")
      }`)
    );
    const withoutPred = resolvePredicates(
      parseSchema(`type Post {
        id: ID!
        postType: String
      }`)
    );

    assert.strictEqual(withPred.get("Post")?.get("postType"), "dgraph.post_type");
    assert.strictEqual(withoutPred.get("Post")?.get("postType"), "Post.postType");
  });

  it("should give payload types equal but separate copies", () => {
    const predicates = resolvePredicates(
      parseSchema(readFixture("with_directives.graphql"))
    );

    for (const typeName of ["Author", "Post", "Character", "Human", "Droid", "Starship"]) {
      const base = predicates.get(typeName);
      for (const payload of [updatePayloadName(typeName), deletePayloadName(typeName)]) {
        assert.deepStrictEqual(predicates.get(payload), base);
        assert.notStrictEqual(predicates.get(payload), base);
      }
    }
  });

  it("should not create payload entries for types without an identifier", () => {
    const predicates = resolvePredicates(
      parseSchema(readFixture("without_directives.graphql"))
    );
    assert.ok(predicates.has("Employee"));
    assert.ok(!predicates.has("UpdateEmployeePayload"));
    assert.ok(!predicates.has("DeleteEmployeePayload"));
  });

  it("should treat an @id field as an identifier that keeps its predicate", () => {
    const predicates = resolvePredicates(
      parseSchema(`type Country {
        code: String! @id
        name: String
      }`)
    );
    const country = new Map([
      ["code", "Country.code"],
      ["name", "Country.name"],
    ]);
    assert.deepStrictEqual(predicates.get("Country"), country);
    assert.deepStrictEqual(predicates.get("UpdateCountryPayload"), country);
  });

  it("should resolve inherited fields to the interface predicate in every implementation", () => {
    const predicates = resolvePredicates(
      parseSchema(readFixture("with_directives.graphql"))
    );
    for (const field of ["name", "appearsIn"]) {
      const expected = predicates.get("Character")?.get(field);
      assert.strictEqual(predicates.get("Human")?.get(field), expected);
      assert.strictEqual(predicates.get("Droid")?.get(field), expected);
    }
  });

  it("should use the override on a re-declared inherited field", () => {
    const predicates = resolvePredicates(
      parseSchema(`
        interface Character {
          id: ID!
          name: String! @dgraph(pred: "char_name")
        }

        type Droid implements Character @dgraph(type: "robot") {
          name: String! @dgraph(pred: "droid_name")
          primaryFunction: String
        }
      `)
    );
    assert.deepStrictEqual(
      predicates.get("Droid"),
      new Map([
        ["name", "droid_name"],
        ["primaryFunction", "robot.primaryFunction"],
      ])
    );
    assert.strictEqual(predicates.get("Character")?.get("name"), "char_name");
  });

  it("should keep the interface predicate when a re-declared field has no override", () => {
    const predicates = resolvePredicates(
      parseSchema(`
        interface Character {
          id: ID!
          name: String! @dgraph(pred: "char_name")
        }

        type Human implements Character {
          name: String!
        }

        type Wookiee implements Character {
          name: String! @dgraph(pred: "char_name")
        }
      `)
    );
    assert.strictEqual(predicates.get("Human")?.get("name"), "char_name");
    assert.strictEqual(predicates.get("Wookiee")?.get("name"), "char_name");
  });

  it("should give a re-declared field its own predicate without an interface override", () => {
    const predicates = resolvePredicates(
      parseSchema(`
        interface Character {
          id: ID!
          name: String!
        }

        type Human implements Character {
          name: String! @dgraph(pred: "human_name")
        }
      `)
    );
    assert.strictEqual(predicates.get("Character")?.get("name"), "Character.name");
    assert.strictEqual(predicates.get("Human")?.get("name"), "human_name");
  });

  it("should follow interfaces that implement other interfaces", () => {
    const predicates = resolvePredicates(
      parseSchema(`
        interface Node {
          id: ID!
          createdAt: DateTime
        }

        interface Named implements Node @dgraph(type: "thing") {
          id: ID!
          name: String!
        }

        type Person implements Named & Node {
          age: Int
        }
      `)
    );

    assert.deepStrictEqual(predicates.get("Node"), new Map([["createdAt", "Node.createdAt"]]));
    assert.deepStrictEqual(
      predicates.get("Named"),
      new Map([
        ["createdAt", "Node.createdAt"],
        ["name", "thing.name"],
      ])
    );
    assert.deepStrictEqual(
      predicates.get("Person"),
      new Map([
        ["name", "thing.name"],
        ["createdAt", "Node.createdAt"],
        ["age", "Person.age"],
      ])
    );
  });

  it("should skip root operation types and @custom fields", () => {
    const predicates = resolvePredicates(parseSchema(readFixture("custom_logic.graphql")));

    assert.ok(!predicates.has("Query"));
    assert.deepStrictEqual(
      predicates.get("User"),
      new Map([
        ["name", "User.name"],
        ["age", "User.age"],
      ])
    );
    assert.deepStrictEqual(
      predicates.get("Movie"),
      new Map([
        ["name", "Movie.name"],
        ["director", "Movie.director"],
      ])
    );
  });

  it("should leave enums out of the map", () => {
    const predicates = resolvePredicates(
      parseSchema(readFixture("without_directives.graphql"))
    );
    assert.ok(!predicates.has("PostType"));
    assert.ok(!predicates.has("Episode"));
  });
});
