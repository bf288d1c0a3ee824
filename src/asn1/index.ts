export * from "./any.js";
export * from "./bit-string.js";
export * from "./boolean.js";
export * from "./integer.js";
export * from "./null.js";
export * from "./object-identifier.js";
export * from "./octet-string.js";
export * from "./strings.js";
export * from "./time.js";
