/**
 * Process entry point: `npm start -- encode 0b981ed2`.
 */

import { runCli } from './cli.ts'

process.exitCode = await runCli(process.argv)
