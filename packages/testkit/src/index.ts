export { createTempDir, removeDir } from "./fs.js";
export { sampleRecord } from "./fixtures.js";
