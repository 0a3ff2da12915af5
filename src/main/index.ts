#!/usr/bin/env node
// SPDX-License-Identifier: GPL-2.0-or-later

import { run } from './cli'

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(err)
    process.exitCode = 1
  },
)
