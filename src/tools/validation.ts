/**
 * Validation utilities for MCP tool inputs
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown,
  ) {
    super(message)
    this.name = 'ValidationError'
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

export type ToolArguments = Record<string, unknown>

export type IntegerBounds = {
  default: number
  minimum: number
  maximum: number
}

/**
 * Accepts a missing argument bag as empty; anything but a plain object is
 * rejected.
 */
export function validateArguments(args: unknown): ToolArguments {
  if (args == null) {
    return {}
  }
  if (typeof args !== 'object' || Array.isArray(args)) {
    throw new ValidationError('arguments must be an object', 'arguments', args)
  }
  return { ...args }
}

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null
}

/**
 * Validates a required string that must not be blank
 */
export function readRequiredString(args: ToolArguments, field: string): string {
  const value = args[field]
  if (isAbsent(value)) {
    throw new ValidationError(`${field} is required`, field, value)
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, field, value)
  }
  if (value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`, field, value)
  }
  return value
}

/**
 * Validates an optional string. An empty string is a real value, not an
 * omission.
 */
export function readOptionalString(args: ToolArguments, field: string): string | undefined {
  const value = args[field]
  if (isAbsent(value)) {
    return undefined
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, field, value)
  }
  return value
}

export function readStringWithDefault(args: ToolArguments, field: string, fallback: string): string {
  return readOptionalString(args, field) ?? fallback
}

/**
 * Validates an optional integer within inclusive bounds
 */
export function readInteger(args: ToolArguments, field: string, bounds: IntegerBounds): number {
  const value = args[field]
  if (isAbsent(value)) {
    return bounds.default
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, field, value)
  }
  if (value < bounds.minimum || value > bounds.maximum) {
    throw new ValidationError(
      `${field} must be between ${bounds.minimum} and ${bounds.maximum}`,
      field,
      value,
    )
  }
  return value
}

/**
 * Validates an optional value against a fixed set of strings
 */
export function readEnum<T extends string>(args: ToolArguments, field: string, allowed: readonly T[]): T | undefined {
  const value = args[field]
  if (isAbsent(value)) {
    return undefined
  }
  const match = allowed.find(candidate => candidate === value)
  if (match === undefined) {
    throw new ValidationError(`${field} must be one of ${allowed.join(', ')}`, field, value)
  }
  return match
}
