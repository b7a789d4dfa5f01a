export { createTempRoot, removeDir, withTempDir, withTempDatabase } from "./fs.js";
export { manualClock, sleep, type ManualClock } from "./timers.js";
