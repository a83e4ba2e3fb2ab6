export * from "./error";
export * from "./general";
export * from "./region";
export * from "./resource-id";
