/**
 * semantic-sort
 *
 * Library entry point. The CLI lives in ./cli/index.ts.
 *
 * @example
 * ```typescript
 * import { createSorterConfig, createSortCoordinator } from "semantic-sort";
 *
 * const config = createSorterConfig({ targetDir: "./downloads", dryRun: true });
 * const result = await createSortCoordinator({ config }).run();
 * console.log(result.plan.countByCategory());
 * ```
 */

export * from "./core/index.js";
export * from "./utils/index.js";
