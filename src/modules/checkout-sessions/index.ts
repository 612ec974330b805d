export * from "./bulk-actions"
export * from "./checkout-dispatcher"
export * from "./config"
export * from "./errors"
export * from "./keyed-lock"
export * from "./model-registry"
export * from "./pg-session-model"
export * from "./provider-router"
export * from "./reconciliation"
export * from "./runtime"
export * from "./service"
export * from "./session-models"
export * from "./session-store-router"
export * from "./state-machine"
export * from "./state-sync"
export * from "./webhook-event"
export * from "./webhook-event-repository"
export * from "./webhook-pipeline"
export * from "./webhook-verifier"
export * from "./http"
