import path from "node:path";

// Plain object export (no `vitest/config` import) so the type-check does not
// depend on Vitest's config types; Vitest reads it the same way.
export default {
  resolve: {
    alias: [
      // "@/lib/..." resolves from the repo root, matching tsconfig paths.
      { find: /^@\//, replacement: `${path.resolve(__dirname, ".")}/` },
    ],
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
};
