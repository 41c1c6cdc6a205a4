export * from "./types/document.js";
export * from "./types/render-result.js";
