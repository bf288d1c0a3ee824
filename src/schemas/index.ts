export * from "./pkcs1.js";
export * from "./sec1.js";
export * from "./spki.js";
