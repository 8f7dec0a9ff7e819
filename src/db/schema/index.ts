export * from "./containers.js";
