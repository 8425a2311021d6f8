export * from "./contracts"
