/**
 * Filesystem module exports.
 */

export { type WalkEntry, type WalkCallback, type OutputFile, walkDirectory, listOutputFiles } from "./walk.js";
