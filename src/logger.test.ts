import { describe, it, expect, afterEach, vi } from 'vitest'
import { getLogLevel, info, levelFromVerbosity, setLogLevel, warn } from './logger'

const initial = getLogLevel()

afterEach(() => {
  setLogLevel(initial)
  vi.restoreAllMocks()
})

describe('logger', () => {
  it('maps verbosity counts to levels', () => {
    expect([1, 2, 3, 4, 6].map(levelFromVerbosity)).toEqual(['error', 'warn', 'info', 'debug', 'debug'])
  })

  it('suppresses messages below the current level', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    setLogLevel('warn')
    info('hidden')
    warn('shown', 2)
    expect(infoSpy).not.toHaveBeenCalled()
    expect(warnSpy).toHaveBeenCalledWith('[warn]', 'shown', 2)
  })
})
