import type { CoefficientGroup } from './types'

export type TaperErrorCode =
  | 'INVALID_DIMENSION'
  | 'LOOKUP_FAILED'
  | 'UNRESOLVED_PARAMETERS'
  | 'DOMAIN_ERROR'
  | 'INVALID_TABLE'

export abstract class TaperError extends Error {
  abstract readonly code: TaperErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Rejected constructor or setter input */
export class InvalidDimensionError extends TaperError {
  readonly code = 'INVALID_DIMENSION'

  constructor(readonly field: string, readonly value: unknown, reason: string) {
    super(`Invalid ${field} (${String(value)}): ${reason}`)
  }
}

export interface LookupFailure {
  group: CoefficientGroup
  /** 'missing' when the provider has no row, 'invalid' when the row failed validation */
  reason: 'missing' | 'invalid'
}

/** One or more coefficient groups could not be resolved */
export class LookupError extends TaperError {
  readonly code = 'LOOKUP_FAILED'
  readonly groups: CoefficientGroup[]

  constructor(readonly failures: LookupFailure[], readonly key: { region: string, species: string, barkIndicator: number }) {
    super(
      `No ${failures.map(f => `${f.group} (${f.reason})`).join(', ')} coefficients for ` +
      `region="${key.region}", species="${key.species}", bark=${key.barkIndicator}`,
    )
    this.groups = failures.map(f => f.group)
  }
}

export class UnresolvedParametersError extends TaperError {
  readonly code = 'UNRESOLVED_PARAMETERS'

  constructor(readonly groups: CoefficientGroup[], operation: string) {
    super(`${operation} requires ${groups.join(' and ')} coefficients; resolve the model first`)
  }
}

/** Division by zero, negative radicand or discriminant, or a non-finite intermediate */
export class DomainError extends TaperError {
  readonly code = 'DOMAIN_ERROR'

  constructor(readonly operation: string, detail: string) {
    super(`${operation}: ${detail}`)
  }
}

export class CoefficientTableError extends TaperError {
  readonly code = 'INVALID_TABLE'

  constructor(readonly table: string, readonly line: number, detail: string) {
    super(`${table} table, line ${line}: ${detail}`)
  }
}
