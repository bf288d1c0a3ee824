export * from "./basic-parser.js";
export * from "./decoder.js";
export * from "./schema-parser.js";
