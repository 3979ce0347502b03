#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {runCli} from './program.js'

process.exitCode = await runCli(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  stderr(line) {
    process.stderr.write(line + '\n')
  }
})
