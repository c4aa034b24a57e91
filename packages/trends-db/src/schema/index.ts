export * from "./github";
export * from "./analytics";
