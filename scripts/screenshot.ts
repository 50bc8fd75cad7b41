/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { runHeadless } from '@core/harness/headless'
import { loadConfig } from '@host/node/config'
import { readProgram } from '@host/node/program'
import { framebufferToPng } from '@host/node/render'

async function main(): Promise<void> {
  const cfg = loadConfig(process.argv.slice(2), process.env)
  const res = runHeadless(readProgram(cfg.rom), { maxFrames: cfg.maxFrames, cpuHz: cfg.cpuHz, trace: cfg.trace })
  if (res.reason === 'error') console.warn(`Stopped early: ${res.message}`)

  const outPath = path.resolve(cfg.out)
  fs.mkdirSync(path.dirname(outPath), { recursive: true })
  const stream = fs.createWriteStream(outPath)
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (e) => reject(e))
    framebufferToPng(res.system.framebuffer, cfg.scale).pack().pipe(stream)
  })
  console.log(`Screenshot written: ${outPath} (${res.frames} frames, ${res.reason})`)
}

main().catch((e) => { console.error(e); process.exit(1) })
