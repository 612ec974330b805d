export * from "./dummy-provider"
