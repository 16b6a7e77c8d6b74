/**
 * Input file helpers.
 */

export { discoverInputs, type DiscoverOptions } from "./discover.js";
export { parseList, readListFile, filterOut } from "./lists.js";
