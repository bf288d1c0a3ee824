export * from "./asn1/index.js";
export * from "./builder/index.js";
export * from "./common/index.js";
export * from "./parser/index.js";
export * from "./schema/index.js";
export * from "./schemas/index.js";
