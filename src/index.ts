export * from "./nbt/index.ts";
export * from "./region/index.ts";
