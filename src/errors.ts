export type ErrorKind =
  | 'JarError'
  | 'TopologyError'
  | 'InvalidTopologyError'
  | 'DependenciesError'
  | 'ConfigError'

export class TopojarError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = kind
  }

  override toString(): string {
    return `[${this.kind}] ${this.message}`
  }
}

export function isTopojarError(value: unknown): value is TopojarError {
  return value instanceof TopojarError
}

// -- Jar errors --------------------------------------------------------------

export class JarError extends TopojarError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super('JarError', code, message, options)
  }
}

export class BaseJarNotFoundError extends JarError {
  constructor(options?: {cause?: unknown}) {
    super('BASE_JAR_NOT_FOUND', 'Base jar not found', options)
  }
}

export class BaseJarInvalidError extends JarError {
  constructor(options?: {cause?: unknown}) {
    super('BASE_JAR_INVALID', 'Base jar is not a jar file', options)
  }
}

export class OutputExistsError extends JarError {
  constructor(readonly path: string, options?: {cause?: unknown}) {
    super('OUTPUT_EXISTS', `Output jar already exists: ${path}`, options)
  }
}

// -- Topology errors ---------------------------------------------------------

export class TopologyError extends TopojarError {
  constructor(code: string, message: string, options?: {cause?: unknown}, kind: ErrorKind = 'TopologyError') {
    super(kind, code, message, options)
  }
}

export class InvalidTopologyError extends TopologyError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options, 'InvalidTopologyError')
  }
}

export class DependenciesError extends TopologyError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options, 'DependenciesError')
  }
}

// -- Config errors -----------------------------------------------------------

export class ConfigError extends TopojarError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('ConfigError', 'INVALID_CONFIG', message, options)
  }
}
