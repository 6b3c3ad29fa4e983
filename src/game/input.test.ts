import { describe, expect, it } from 'vitest'
import { applyInputCommand, parseKeyCommand } from './input'
import { GameSession } from './session'
import { sequenceRandom } from '../test/random'

describe('parseKeyCommand', () => {
  it('starts or quits from the menu', () => {
    expect(parseKeyCommand('Space', 'menu')).toEqual({ type: 'start' })
    expect(parseKeyCommand('Enter', 'menu')).toEqual({ type: 'start' })
    expect(parseKeyCommand('NumpadEnter', 'menu')).toEqual({ type: 'start' })
    expect(parseKeyCommand('Escape', 'menu')).toEqual({ type: 'quit' })
    expect(parseKeyCommand('ArrowUp', 'menu')).toBeNull()
  })

  it('steers with arrows and WASD while playing', () => {
    expect(parseKeyCommand('ArrowUp', 'playing')).toEqual({ type: 'direction', direction: 'up' })
    expect(parseKeyCommand('KeyA', 'playing')).toEqual({ type: 'direction', direction: 'left' })
    expect(parseKeyCommand('KeyS', 'playing')).toEqual({ type: 'direction', direction: 'down' })
    expect(parseKeyCommand('ArrowRight', 'playing')).toEqual({ type: 'direction', direction: 'right' })
    expect(parseKeyCommand('Space', 'playing')).toEqual({ type: 'togglePause' })
    expect(parseKeyCommand('Escape', 'playing')).toEqual({ type: 'menu' })
    expect(parseKeyCommand('KeyR', 'playing')).toBeNull()
  })

  it('only resumes or leaves while paused', () => {
    expect(parseKeyCommand('Space', 'paused')).toEqual({ type: 'togglePause' })
    expect(parseKeyCommand('Escape', 'paused')).toEqual({ type: 'menu' })
    expect(parseKeyCommand('ArrowLeft', 'paused')).toBeNull()
  })

  it('restarts or leaves after game over', () => {
    expect(parseKeyCommand('KeyR', 'gameOver')).toEqual({ type: 'restart' })
    expect(parseKeyCommand('Escape', 'gameOver')).toEqual({ type: 'menu' })
    expect(parseKeyCommand('Space', 'gameOver')).toBeNull()
  })

  it('does not treat object keys as directions', () => {
    expect(parseKeyCommand('toString', 'playing')).toBeNull()
    expect(parseKeyCommand('constructor', 'playing')).toBeNull()
    expect(parseKeyCommand('KeyW', 'playing')).toEqual({ type: 'direction', direction: 'up' })
  })
})

describe('applyInputCommand', () => {
  it('drives the session through its phases', () => {
    const session = new GameSession({ random: sequenceRandom([]) })

    expect(applyInputCommand(session, { type: 'start' })).toBe(true)
    expect(session.getPhase()).toBe('playing')

    expect(applyInputCommand(session, { type: 'direction', direction: 'down' })).toBe(true)
    session.tick()
    expect(session.snapshot().snake.body[0]).toEqual({ x: 20, y: 12 })

    expect(applyInputCommand(session, { type: 'togglePause' })).toBe(true)
    expect(session.getPhase()).toBe('paused')
    expect(applyInputCommand(session, { type: 'direction', direction: 'left' })).toBe(false)

    expect(applyInputCommand(session, { type: 'menu' })).toBe(true)
    expect(session.getPhase()).toBe('menu')
    expect(applyInputCommand(session, { type: 'restart' })).toBe(false)
  })

  it('leaves quitting to the caller', () => {
    const session = new GameSession()
    expect(applyInputCommand(session, { type: 'quit' })).toBe(false)
    expect(session.getPhase()).toBe('menu')
  })
})
