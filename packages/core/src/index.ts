export * from "./contracts/result";
export * from "./contracts/token";
