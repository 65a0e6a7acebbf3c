#!/usr/bin/env tsx

import { NvdlError, logNvdlError } from '../core/error-handler'
import { run } from './index'

run().catch((err: unknown) => {
  logNvdlError(NvdlError.from(err))
  process.exit(1)
})
