export * from "./basic-builder.js";
export * from "./encoder.js";
export * from "./schema-builder.js";
