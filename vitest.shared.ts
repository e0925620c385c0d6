import { fileURLToPath } from "url";

function source(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

/**
 * Resolve the workspace packages to their TypeScript sources, so tests run
 * without a build. Package manifests point Node at `dist/`.
 */
export const workspaceAlias = [
  { find: /^@untagged\/core$/, replacement: source("./packages/core/src/index.ts") },
  { find: /^@untagged\/runtime$/, replacement: source("./packages/runtime/src/index.ts") },
  { find: /^@untagged\/tuple$/, replacement: source("./packages/tuple/src/index.ts") },
  {
    find: /^@untagged\/transformer\/pipeline$/,
    replacement: source("./packages/transformer/src/pipeline.ts"),
  },
  { find: /^@untagged\/transformer$/, replacement: source("./packages/transformer/src/index.ts") },
];
