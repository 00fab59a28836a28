export * from "./extraction.js";
