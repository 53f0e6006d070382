/**
 * Library entry: the chunking engine and the tools built on it.
 */

export * from "./splitter";
export * from "./tools";
