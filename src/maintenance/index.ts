export { pruneHistory, type PruneReport } from "./prune.js";
