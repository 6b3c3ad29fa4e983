import { useEffect } from 'react'
import type { GameSession } from '@game/session'

const GESTURE_EVENTS = ['pointerdown', 'keydown'] as const

/**
 * Browsers refuse audio until the page has seen a user gesture, so music
 * requested at startup is lost. The first gesture asks for it again.
 */
export function useAudioUnlock(session: GameSession, enabled: boolean): void {
  useEffect(() => {
    if (!enabled) return

    const detach = () => {
      for (const type of GESTURE_EVENTS) {
        window.removeEventListener(type, onGesture, true)
      }
    }
    const onGesture = () => {
      detach()
      session.replayPhaseMusic()
    }

    // Capture phase, so the music request lands before the key is handled as a command.
    for (const type of GESTURE_EVENTS) {
      window.addEventListener(type, onGesture, true)
    }
    return detach
  }, [session, enabled])
}
