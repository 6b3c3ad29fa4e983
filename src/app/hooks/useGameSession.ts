import { useEffect, useState } from 'react'
import type { GameSnapshot } from '@game/types'
import type { GameRuntime } from '../core/runtime'

/** Mirrors the session into React state and runs its tick loop while mounted. */
export function useGameSession(runtime: GameRuntime, running: boolean): GameSnapshot {
  const [snapshot, setSnapshot] = useState(() => runtime.session.snapshot())

  useEffect(() => {
    setSnapshot(runtime.session.snapshot())
    return runtime.session.subscribe(setSnapshot)
  }, [runtime])

  useEffect(() => {
    if (!running) return
    runtime.loop.start()
    return () => {
      runtime.loop.stop()
    }
  }, [runtime, running])

  return snapshot
}
