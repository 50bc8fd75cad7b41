/* eslint-disable no-console */
import { Chip8System } from '@core/system/system'
import { TIMER_HZ } from '@core/cpu/constants'
import { loadConfig } from '@host/node/config'
import { keyFor } from '@host/node/keymap'
import { readProgram } from '@host/node/program'
import { renderAscii } from '@host/node/render'

// Terminals report key presses only, so a key stays down for this long
const KEY_HOLD_MS = 150

async function main(): Promise<void> {
  const cfg = loadConfig(process.argv.slice(2), process.env)
  const sys = new Chip8System(readProgram(cfg.rom), { cpuHz: cfg.cpuHz, trace: false })
  const stdin = process.stdin
  if (!stdin.isTTY) throw new Error('play needs an interactive terminal')

  const releaseTimers = new Map<number, NodeJS.Timeout>()
  let dirty = true
  sys.onDisplayChanged(() => { dirty = true })
  let haltedAt: number | null = null
  sys.onHalt((addr) => { haltedAt = addr })

  await new Promise<void>((resolve, reject) => {
    const stop = (err?: Error) => {
      clearInterval(loop)
      for (const t of releaseTimers.values()) clearTimeout(t)
      stdin.setRawMode(false)
      stdin.pause()
      stdin.removeListener('data', onData)
      if (err) reject(err); else resolve()
    }

    const onData = (buf: Buffer) => {
      const ch = buf.toString('utf8')
      if (ch === '\u0003' || ch === '\u001b') { stop(); return }
      if (ch === 'p' && sys.paused) { sys.resume(); return }
      const key = keyFor(ch)
      if (key === null) return
      sys.keypad.setKey(key, true)
      const prev = releaseTimers.get(key)
      if (prev) clearTimeout(prev)
      releaseTimers.set(key, setTimeout(() => { sys.keypad.setKey(key, false); releaseTimers.delete(key) }, KEY_HOLD_MS))
    }

    stdin.setRawMode(true)
    stdin.resume()
    stdin.on('data', onData)

    const loop = setInterval(() => {
      const r = sys.runFrame()
      if (dirty) {
        process.stdout.write('\u001b[H\u001b[2J' + renderAscii(sys.framebuffer) + '\n')
        dirty = false
      }
      if (haltedAt !== null) {
        process.stdout.write(`Halted on a self-jump at 0x${haltedAt.toString(16).toUpperCase()}. p = resume, Esc = quit\n`)
        haltedAt = null
      }
      if (r.reason === 'error') stop(sys.lastError ?? new Error('emulation stopped'))
    }, Math.round(1000 / TIMER_HZ))
  })
}

main().catch((e) => { console.error(e); process.exit(1) })
