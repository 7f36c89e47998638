import assert from "node:assert/strict";
import test from "node:test";

import { filterRelevantFiles, matchesAnyPattern } from "../src/review/file-filter.js";
import type { FileChange } from "../src/review/review-types.js";

function change(path: string, status = "modified"): FileChange {
  return { path, status, additions: 1, deletions: 0 };
}

test("default patterns keep source files and drop tests, declarations and docs", () => {
  const relevant = filterRelevantFiles([
    change("src/index.ts"),
    change("src/ui/Button.tsx", "added"),
    change("src/index.test.ts"),
    change("src/types.d.ts"),
    change("src/__tests__/helper.ts"),
    change("docs/readme.md"),
    change("scripts/build.ts"),
    change("src/removed.ts", "removed"),
  ]);

  assert.deepEqual(relevant.map((file) => file.path), ["src/index.ts", "src/ui/Button.tsx"]);
});

test("custom patterns replace the defaults", () => {
  const relevant = filterRelevantFiles(
    [change("lib/a.ts"), change("lib/vendor/b.ts"), change("src/c.ts")],
    { include: ["lib/**/*.ts"], exclude: ["lib/vendor/**"] },
  );

  assert.deepEqual(relevant.map((file) => file.path), ["lib/a.ts"]);
  assert.equal(matchesAnyPattern(".github/workflows/ci.yml", [".github/**"]), true);
});
