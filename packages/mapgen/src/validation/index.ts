export * from "./validate-map";
