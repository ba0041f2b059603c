import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/esql-builder": {
      entry: ["src/index.ts", "examples/*.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts", "examples/**/*.ts"],
    },
  },
};

export default config;
