// Core types - shared across all packages
export * from './types'

// Schemas for validating host records and the provider block
export * from './schemas/record'
