export { createTempDir, removeDir, withTempAccounts, withTempDir } from "./fs.js";
export { sleep, timed } from "./timers.js";
export type { Timed } from "./timers.js";
