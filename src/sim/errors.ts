export class ElevatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ValidationError extends ElevatorError {
  readonly value: unknown

  constructor(message: string, value: unknown) {
    super(message)
    this.value = value
  }
}

// Thrown by shape parsing; ElevatorState and the registry turn it into a warning plus defaults.
export class StateCorruptionError extends ElevatorError {
  readonly value: unknown

  constructor(message: string, value: unknown) {
    super(message)
    this.value = value
  }
}

export class TransientStoreError extends ElevatorError {
  readonly operation: string

  constructor(operation: string, cause: unknown) {
    super(`Store operation ${operation} failed: ${describeError(cause)}`, { cause })
    this.operation = operation
  }
}

export class ConfigError extends ElevatorError {
  readonly key: string

  constructor(key: string, message: string) {
    super(`Invalid config ${key}: ${message}`)
    this.key = key
  }
}

export async function storeCall<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run()
  } catch (err) {
    if (err instanceof TransientStoreError) throw err
    throw new TransientStoreError(operation, err)
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
