import { beforeAll, afterAll } from 'vitest'

// recovery paths log this on purpose; tests assert it through their own logger
const NOISY = '[sync] line count mismatch'

let originalWarn: typeof console.warn

beforeAll(() => {
  originalWarn = console.warn
  console.warn = (...args: unknown[]) => {
    const first = args[0]
    if (typeof first === 'string' && first.includes(NOISY)) return
    return originalWarn(...args)
  }
})

afterAll(() => {
  console.warn = originalWarn
})
