#!/usr/bin/env node
/* eslint-disable no-console */
import { runHeadless } from '@core/harness/headless'
import { loadConfig } from '@host/node/config'
import { readProgram } from '@host/node/program'
import { renderAscii } from '@host/node/render'

async function main() {
  const cfg = loadConfig(process.argv.slice(2), process.env)
  const program = readProgram(cfg.rom)
  const res = runHeadless(program, { maxFrames: cfg.maxFrames, cpuHz: cfg.cpuHz, trace: cfg.trace })
  console.log(renderAscii(res.system.framebuffer, '#', '.'))
  const s = res.system.cpu.state
  console.log(`reason=${res.reason} frames=${res.frames} steps=${res.steps} pc=0x${s.pc.toString(16).toUpperCase().padStart(3, '0')}`)
  if (res.reason === 'error') {
    console.error(res.message)
    process.exit(1)
  }
}

main().catch((e) => { console.error(e); process.exit(1) })
