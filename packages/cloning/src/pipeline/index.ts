export * from "./context";
export * from "./rollback";
export * from "./clone-pipeline";
export * from "./stages";
export * from "./cleanup";
