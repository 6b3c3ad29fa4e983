import { useEffect, useRef } from 'react'
import type { GameSession } from '@game/session'
import { applyInputCommand, parseKeyCommand } from '@game/input'

export type UseInputControlsOptions = {
  session: GameSession
  enabled: boolean
  onQuit: () => void
}

export function useInputControls(options: UseInputControlsOptions): void {
  const onQuitRef = useRef(options.onQuit)

  useEffect(() => {
    onQuitRef.current = options.onQuit
  }, [options.onQuit])

  useEffect(() => {
    if (!options.enabled) return

    const onKeyDown = (event: KeyboardEvent) => {
      if (event.repeat && event.code === 'Space') return
      const target = event.target
      // Let focused buttons handle their own Enter/Space activation.
      if (target instanceof HTMLButtonElement && (event.code === 'Enter' || event.code === 'Space')) return

      const command = parseKeyCommand(event.code, options.session.getPhase())
      if (!command) return
      event.preventDefault()

      if (command.type === 'quit') {
        onQuitRef.current()
        return
      }
      applyInputCommand(options.session, command)
    }

    window.addEventListener('keydown', onKeyDown)
    return () => {
      window.removeEventListener('keydown', onKeyDown)
    }
  }, [options.enabled, options.session])
}
