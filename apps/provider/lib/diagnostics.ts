/**
 * Diagnostics
 *
 * Accumulates warnings and errors for a lifecycle operation. Operations stop
 * performing side effects once an error has been recorded.
 */

import type { Diagnostic } from '@tfsync/core'
import {
  ObjectStoreError,
  ProviderNotConfiguredError,
  PutObjectValidationError,
  StateSourceError,
  StateVersionNotFoundError,
  errorMessage,
} from './errors'

export class Diagnostics {
  private readonly items: Diagnostic[] = []

  addError(summary: string, detail: string): void {
    this.items.push({ severity: 'error', summary, detail })
  }

  addWarning(summary: string, detail: string): void {
    this.items.push({ severity: 'warning', summary, detail })
  }

  append(diagnostics: Iterable<Diagnostic>): void {
    for (const diagnostic of diagnostics) {
      this.items.push(diagnostic)
    }
  }

  /**
   * Record a thrown value as one or more error diagnostics.
   */
  addThrown(err: unknown): void {
    this.append(diagnosticsFromError(err))
  }

  hasError(): boolean {
    return this.items.some((d) => d.severity === 'error')
  }

  toArray(): Diagnostic[] {
    return [...this.items]
  }
}

/**
 * Map an adapter error to the diagnostics reported to the host.
 */
export function diagnosticsFromError(err: unknown): Diagnostic[] {
  if (err instanceof PutObjectValidationError) {
    return err.issues.map((issue) => ({
      severity: 'error',
      summary: 'putObjectOptions',
      detail: issue,
    }))
  }

  if (err instanceof ProviderNotConfiguredError) {
    return [{ severity: 'error', summary: 'provider', detail: err.message }]
  }

  if (err instanceof StateVersionNotFoundError) {
    return [
      {
        severity: 'error',
        summary: 'tfe client',
        detail: `failed to get state version: ${err.message}`,
      },
    ]
  }

  if (err instanceof StateSourceError) {
    const prefix =
      err.operation === 'download state'
        ? 'failed to download state'
        : 'failed to get state version'
    return [
      {
        severity: 'error',
        summary: 'tfe client',
        detail: `${prefix} for workspace ${err.workspaceId}: ${err.message}`,
      },
    ]
  }

  if (err instanceof ObjectStoreError) {
    return [
      {
        severity: 'error',
        summary: 's3 client',
        detail: `failed to ${err.operation} s3://${err.bucket}/${err.key}: ${err.message}`,
      },
    ]
  }

  return [{ severity: 'error', summary: 'tfsync', detail: errorMessage(err) }]
}
