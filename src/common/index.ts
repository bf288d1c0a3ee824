export * from "./byte-slice.js";
export * from "./codecs.js";
export * from "./errors.js";
export * from "./length.js";
export * from "./secret-bytes.js";
export * from "./tag-mode.js";
export * from "./tag.js";
export * from "./types.js";
