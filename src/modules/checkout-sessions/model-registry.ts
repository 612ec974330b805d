import { ConfigurationError } from "./errors"
import type { SessionStorageModel } from "./session-models"

export type ModelRef = SessionStorageModel | string

/**
 * Ordered set of storage models. Registration order is the search order
 * for lookups and the iteration order for listings.
 */
export class ModelRegistry {
  private readonly models: SessionStorageModel[] = []

  constructor(models: Iterable<SessionStorageModel> = []) {
    for (const model of models) {
      this.register(model)
    }
  }

  register(model: SessionStorageModel): this {
    if (this.models.includes(model)) {
      return this
    }

    const name = model.name.trim()
    if (!name) {
      throw new ConfigurationError("Session model name is required.", {
        code: "CHECKOUT_CONFIG_INVALID",
        httpStatus: 500,
      })
    }

    if (this.models.some((existing) => existing.name === name)) {
      throw new ConfigurationError(`Session model name is already taken: ${name}`, {
        code: "CHECKOUT_CONFIG_INVALID",
        httpStatus: 500,
        details: { model: name },
      })
    }

    this.models.push(model)
    return this
  }

  list(): readonly SessionStorageModel[] {
    return [...this.models]
  }

  names(): string[] {
    return this.models.map((model) => model.name)
  }

  first(): SessionStorageModel | null {
    return this.models[0] ?? null
  }

  get size(): number {
    return this.models.length
  }

  has(ref: ModelRef): boolean {
    return this.find(ref) !== null
  }

  resolve(ref: ModelRef): SessionStorageModel {
    const model = this.find(ref)
    if (!model) {
      const name = typeof ref === "string" ? ref : ref.name
      throw new ConfigurationError(`Session model is not registered: ${name}`, {
        details: { model: name },
      })
    }

    return model
  }

  private find(ref: ModelRef): SessionStorageModel | null {
    if (typeof ref !== "string") {
      return this.models.includes(ref) ? ref : null
    }

    const name = ref.trim()
    return this.models.find((model) => model.name === name) ?? null
  }
}
