// Main entry point
export * from "./node";
