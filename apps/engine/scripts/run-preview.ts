#!/usr/bin/env tsx
// apps/engine/scripts/run-preview.ts
import 'dotenv/config'
import process from 'node:process'
import { runPreviewCli } from '../src/cli.js'

process.exitCode = runPreviewCli(process.argv.slice(2))
