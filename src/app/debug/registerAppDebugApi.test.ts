import { afterEach, describe, expect, it } from 'vitest'
import { GameSession } from '@game/session'
import { registerAppDebugApi } from './registerAppDebugApi'
import { getStoredConfigOverrides } from '../core/debugSettings'
import { sequenceRandom } from '../../test/random'

describe('registerAppDebugApi', () => {
  afterEach(() => {
    delete window.__SNAKE_DEBUG__
  })

  it('exposes the session on window', () => {
    const session = new GameSession({ random: sequenceRandom([]) })
    registerAppDebugApi({ session })
    const api = window.__SNAKE_DEBUG__

    expect(api?.getSnapshot?.().phase).toBe('menu')
    expect(api?.getConfig?.().grid.width).toBe(30)

    session.start()
    api?.setDirection?.('down')
    expect(api?.step?.()).toBe('continue')
    expect(api?.getSnapshot?.().snake.body[0]).toEqual({ x: 20, y: 12 })
  })

  it('hands out config copies', () => {
    const session = new GameSession()
    registerAppDebugApi({ session })
    const config = window.__SNAKE_DEBUG__?.getConfig?.()
    if (config) config.grid.width = 5
    expect(session.config.grid.width).toBe(30)
  })

  it('persists parsed config overrides', () => {
    registerAppDebugApi({ session: new GameSession() })
    const saved = window.__SNAKE_DEBUG__?.setConfigOverrides?.({ speed: { initialTickRate: 8, max: 'fast' } })
    expect(saved).toBe(true)
    expect(getStoredConfigOverrides()).toEqual({ speed: { initialTickRate: 8 } })
  })

  it('removes everything it registered', () => {
    const cleanup = registerAppDebugApi({ session: new GameSession() })
    cleanup()
    expect(window.__SNAKE_DEBUG__).toEqual({})
  })
})
