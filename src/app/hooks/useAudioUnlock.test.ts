import { describe, expect, it } from 'vitest'
import { fireEvent, renderHook } from '@testing-library/react'
import type { MusicTrack } from '@game/types'
import type { AudioSink } from '@game/audio'
import { GameSession } from '@game/session'
import { useAudioUnlock } from './useAudioUnlock'
import { useInputControls } from './useInputControls'
import { sequenceRandom } from '../../test/random'

function musicRecorder() {
  const tracks: MusicTrack[] = []
  const audio: AudioSink = {
    playSound: () => {},
    playMusic: (track) => tracks.push(track),
    stopMusic: () => {},
  }
  return { audio, tracks }
}

describe('useAudioUnlock', () => {
  it('asks for the menu music again on the first key press only', () => {
    const { audio, tracks } = musicRecorder()
    const session = new GameSession({ audio })
    renderHook(() => useAudioUnlock(session, true))
    expect(tracks).toEqual(['menu'])

    fireEvent.keyDown(window, { code: 'KeyQ' })
    expect(tracks).toEqual(['menu', 'menu'])

    fireEvent.pointerDown(window)
    fireEvent.keyDown(window, { code: 'KeyQ' })
    expect(tracks).toEqual(['menu', 'menu'])
  })

  it('treats a pointer press as a gesture', () => {
    const { audio, tracks } = musicRecorder()
    const session = new GameSession({ audio })
    renderHook(() => useAudioUnlock(session, true))

    fireEvent.pointerDown(document.body)
    expect(tracks).toEqual(['menu', 'menu'])
  })

  it('requests menu music before the key starts the game', () => {
    const { audio, tracks } = musicRecorder()
    const session = new GameSession({ audio, random: sequenceRandom([]) })
    renderHook(() => {
      useInputControls({ session, enabled: true, onQuit: () => {} })
      useAudioUnlock(session, true)
    })

    fireEvent.keyDown(document.body, { code: 'Space' })
    expect(session.getPhase()).toBe('playing')
    expect(tracks).toEqual(['menu', 'menu', 'playing'])
  })

  it('does nothing while disabled', () => {
    const { audio, tracks } = musicRecorder()
    const session = new GameSession({ audio })
    renderHook(() => useAudioUnlock(session, false))

    fireEvent.keyDown(window, { code: 'KeyQ' })
    expect(tracks).toEqual(['menu'])
  })
})
