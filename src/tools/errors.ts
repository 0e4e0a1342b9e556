/**
 * Shared error handling utilities for MCP tools
 */

import { InvalidArgumentError, NotFoundError, RemoteApiError } from '../google/index.js'
import { ValidationError } from './validation.js'

export class UnknownToolError extends Error {
  constructor(
    public readonly toolName: string,
    available: string[],
  ) {
    super(`Unknown tool: ${toolName}. Available tools: ${available.join(', ')}`)
    this.name = 'UnknownToolError'
    Object.setPrototypeOf(this, UnknownToolError.prototype)
  }
}

export type ToolFailureKind =
  | 'AuthError'
  | 'UnknownToolError'
  | 'ValidationError'
  | 'RemoteApiError'
  | 'NotFoundError'
  | 'InvalidArgumentError'
  | 'InternalError'

/**
 * Every failure a dispatch can end in, before it is rendered as text
 */
export interface ToolFailure {
  kind: ToolFailureKind
  message: string
  toolName?: string
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Failure of the authentication sequence (credentials or session build)
 */
export function authFailure(error: unknown, toolName: string): ToolFailure {
  return {
    kind: 'AuthError',
    message: `Could not authenticate with Google: ${messageOf(error)}`,
    toolName,
  }
}

/**
 * Classifies an error raised while validating or running a tool
 */
export function toToolFailure(error: unknown, toolName: string): ToolFailure {
  if (error instanceof UnknownToolError) {
    return { kind: 'UnknownToolError', message: error.message, toolName }
  }

  if (error instanceof ValidationError) {
    return { kind: 'ValidationError', message: `Invalid arguments: ${error.message}`, toolName }
  }

  if (error instanceof InvalidArgumentError) {
    return { kind: 'InvalidArgumentError', message: `Invalid arguments: ${error.message}`, toolName }
  }

  if (error instanceof NotFoundError) {
    return { kind: 'NotFoundError', message: error.message, toolName }
  }

  if (error instanceof RemoteApiError) {
    return { kind: 'RemoteApiError', message: error.message, toolName }
  }

  return {
    kind: 'InternalError',
    message: `${toolName} failed unexpectedly: ${messageOf(error)}`,
    toolName,
  }
}
