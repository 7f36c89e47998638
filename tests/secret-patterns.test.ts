import assert from "node:assert/strict";
import test from "node:test";

import { compileCustomSecretPatterns } from "../src/core/secret-patterns.js";

test("custom secret patterns drop blanks, broken and empty-matching entries", () => {
  const compiled = compileCustomSecretPatterns([
    "",
    "   ",
    "(unclosed",
    "a*",
    "/acme-[0-9]+/gi",
    "token_[a-z]{4}",
  ]);

  assert.deepEqual(
    compiled.map((regex) => [regex.source, regex.flags]),
    [
      ["acme-[0-9]+", "gi"],
      ["token_[a-z]{4}", "g"],
    ],
  );
});

test("custom secret patterns keep only supported flags", () => {
  const [regex] = compileCustomSecretPatterns(["/abc/ymu"]);

  assert.equal(regex?.flags, "gmu");
});

test("custom secret patterns are capped in count and length", () => {
  const many = Array.from({ length: 25 }, (_, index) => `literal-${index}`);
  assert.equal(compileCustomSecretPatterns(many).length, 20);

  const [long] = compileCustomSecretPatterns(["x".repeat(300)]);
  assert.equal(long?.source.length, 240);
});
