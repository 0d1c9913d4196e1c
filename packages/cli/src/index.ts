#!/usr/bin/env tsx
import { createProgram } from './program'

createProgram()
  .parseAsync()
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : 'Command failed')
    process.exit(1)
  })
