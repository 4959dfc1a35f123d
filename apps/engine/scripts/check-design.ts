#!/usr/bin/env tsx
// apps/engine/scripts/check-design.ts
import 'dotenv/config'
import process from 'node:process'
import { runCheckCli } from '../src/cli.js'

process.exitCode = runCheckCli(process.argv.slice(2))
