#!/usr/bin/env tsx
import { main } from './cli.js'

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(error)
    process.exit(1)
  })
