#!/usr/bin/env node

import { buildProgram, exitCodeFor, logFullError } from './cli/program'
import { ConfigLoader } from './core/config/default'
import { ErrorEnvironment } from './core/errors/taxonomy'
import { setLogVerbosity } from './log/utils'

let environment = ErrorEnvironment.DEVELOPMENT

async function main(): Promise<void> {
    const config = ConfigLoader.load(process.env, process.cwd())
    environment = config.environment
    setLogVerbosity(config.logLevel)
    await buildProgram({ config, env: process.env }).parseAsync(process.argv)
}

main().catch((error: unknown) => {
    logFullError(error, environment)
    process.exitCode = exitCodeFor(error)
})
