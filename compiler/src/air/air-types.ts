export * from "./air-types/index.ts";
