export * from "./ICheckoutProvider"
