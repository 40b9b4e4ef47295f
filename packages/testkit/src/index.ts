/**
 * Test helpers for check-collectd
 */

export { createTempDir, removeDir } from "./fs.js";
export { writeFakeUtility } from "./utility.js";
export type { FakeUtility, FakeUtilityOptions } from "./utility.js";
