export * from "./contracts"
export * from "./similarity"
