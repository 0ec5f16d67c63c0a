import { describe, it } from "node:test";
import * as assert from "node:assert";
import { isMappingError } from "../src/errors.js";
import { parseBodyTemplate, variableName } from "../src/template/body-template.js";

describe("parseBodyTemplate", () => {
  it("should parse a body template with nested objects", () => {
    const { body, variables } = parseBodyTemplate(`{ author: $id, post: { id: $postID }}`);

    assert.deepStrictEqual(body, { author: "$id", post: { id: "$postID" } });
    assert.deepStrictEqual(variables, new Set(["id", "postID"]));
  });

  it("should parse a body template with an array", () => {
    const { body, variables } = parseBodyTemplate(
      `{ author: $id, admin: $admin, post: { id: $postID, comments: [{ text: $text }] },
         age: $age}`
    );

    assert.deepStrictEqual(body, {
      author: "$id",
      admin: "$admin",
      post: { id: "$postID", comments: [{ text: "$text" }] },
      age: "$age",
    });
    assert.deepStrictEqual(variables, new Set(["id", "admin", "postID", "text", "age"]));
  });

  it("should keep literals and quoted strings", () => {
    const { body, variables } = parseBodyTemplate(
      `{ count: 10, ok: true, none: null, label: "a b, c", tags: [1, two, $t] }`
    );

    assert.deepStrictEqual(body, {
      count: 10,
      ok: true,
      none: null,
      label: "a b, c",
      tags: [1, "two", "$t"],
    });
    assert.deepStrictEqual(variables, new Set(["t"]));
  });

  it("should quote literal-looking keys", () => {
    const { body } = parseBodyTemplate(`{ true: 1, 42: false }`);
    assert.deepStrictEqual(body, { true: 1, "42": false });
  });

  it("should accept a top-level array", () => {
    const { body, variables } = parseBodyTemplate(`[{ uid: $id }]`);
    assert.deepStrictEqual(body, [{ uid: "$id" }]);
    assert.deepStrictEqual(variables, new Set(["id"]));
  });

  it("should not treat quoted strings as variables", () => {
    const { body, variables, refs } = parseBodyTemplate(`{ q: $q, currency: "$USD" }`);

    assert.deepStrictEqual(body, { q: "$q", currency: "$USD" });
    assert.deepStrictEqual(variables, new Set(["q"]));
    assert.deepStrictEqual(refs, [{ path: ["q"], name: "q" }]);
  });

  it("should record the path of every variable", () => {
    const { refs } = parseBodyTemplate(`{ list: [1, { id: $id }, [$n]], top: $t }`);
    assert.deepStrictEqual(refs, [
      { path: ["list", 1, "id"], name: "id" },
      { path: ["list", 2, 0], name: "n" },
      { path: ["top"], name: "t" },
    ]);
  });

  it("should treat a variable token in key position as a plain key", () => {
    const { body, variables, refs } = parseBodyTemplate(`{ $k: 1, v: $k }`);

    assert.deepStrictEqual(body, { $k: 1, v: "$k" });
    assert.deepStrictEqual(variables, new Set(["k"]));
    assert.deepStrictEqual(refs, [{ path: ["v"], name: "k" }]);
  });

  it("should drop variables overwritten by a repeated key", () => {
    const { body, variables } = parseBodyTemplate(`{ a: $x, a: "fixed", b: { c: $y }, b: 2 }`);

    assert.deepStrictEqual(body, { a: "fixed", b: 2 });
    assert.strictEqual(variables.size, 0);
  });

  it("should return no body for an empty template", () => {
    const { body, variables } = parseBodyTemplate("  \n ");
    assert.strictEqual(body, undefined);
    assert.strictEqual(variables.size, 0);
  });

  it("should report invalid JSON with the rewritten body", () => {
    assert.throws(
      () => parseBodyTemplate(`{ author: $id, post: { id $postID }}`),
      (err: unknown) =>
        isMappingError(err, "malformed-template") &&
        err.detail.rewritten === `{"author":"$id","post":{"id""$postID"}}` &&
        err.message ===
          `couldn't unmarshal HTTP body: {"author":"$id","post":{"id""$postID"}} as JSON`
    );
  });

  it("should report unmatched curly braces", () => {
    assert.throws(() => parseBodyTemplate(`{{ author: $id, post: { id: $postID }}`), {
      message: "found unmatched curly braces while parsing body template",
    });
  });

  it("should report a closing brace before its opening one", () => {
    assert.throws(() => parseBodyTemplate(`{ a: 1 }}{`), {
      message: "found unmatched curly braces while parsing body template",
    });
  });

  it("should report an invalid character", () => {
    assert.throws(() => parseBodyTemplate(`(author: $id, post: { id: $postID }}`), {
      message: "invalid character: ( while parsing body template",
    });
  });

  it("should report invalid characters before unbalanced braces", () => {
    assert.throws(
      () => parseBodyTemplate(`{{ a: $b, c: 1.5 }`),
      (err: unknown) => isMappingError(err, "invalid-character") && err.detail.char === "."
    );
  });

  it("should reject a marker that does not start a variable", () => {
    assert.throws(() => parseBodyTemplate(`{ a: $1 }`), {
      message: "invalid character: $ while parsing body template",
    });
  });
});

describe("variableName", () => {
  it("should only match a marker followed by an identifier", () => {
    assert.strictEqual(variableName("$postID"), "postID");
    assert.strictEqual(variableName("$post_id2"), "post_id2");
    assert.strictEqual(variableName("$"), undefined);
    assert.strictEqual(variableName("price $5"), undefined);
    assert.strictEqual(variableName("$a b"), undefined);
  });
});
