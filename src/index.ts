/**
 * Command Gateway - Main entry point
 *
 * Executes LLM tool calls against the local machine behind a fixed security
 * policy: file and text tools, application launch and shutdown, extension
 * tools and an encrypted credential store.
 */

export * from "./types";
export * from "./interfaces";
export * from "./lib";
