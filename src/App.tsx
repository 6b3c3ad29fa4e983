import { useCallback, useEffect, useRef, useState } from 'react'
import './App.css'
import type { GameRuntime } from './app/core/runtime'
import { DEBUG_UI_ENABLED } from './app/core/debugSettings'
import { registerAppDebugApi } from './app/debug/registerAppDebugApi'
import { useGameSession } from './app/hooks/useGameSession'
import { useInputControls } from './app/hooks/useInputControls'
import { useCanvasRenderer } from './app/hooks/useCanvasRenderer'
import { useAudioUnlock } from './app/hooks/useAudioUnlock'
import { MenuOverlay } from './app/components/MenuOverlay'
import { PauseOverlay } from './app/components/PauseOverlay'
import { GameOverOverlay } from './app/components/GameOverOverlay'
import { QuitOverlay } from './app/components/QuitOverlay'

type AppProps = {
  runtime: GameRuntime
}

export default function App({ runtime }: AppProps) {
  const [closed, setClosed] = useState(false)
  const canvasRef = useRef<HTMLCanvasElement>(null)
  const { session } = runtime

  const snapshot = useGameSession(runtime, !closed)
  useCanvasRenderer(canvasRef, snapshot, session.config.grid)

  const handleQuit = useCallback(() => {
    runtime.loop.stop()
    runtime.audio.stopMusic()
    runtime.logger.info('quit')
    setClosed(true)
  }, [runtime])

  const handleReopen = useCallback(() => {
    runtime.audio.playMusic('menu')
    setClosed(false)
  }, [runtime])

  useInputControls({ session, enabled: !closed, onQuit: handleQuit })
  useAudioUnlock(session, !closed)

  useEffect(() => {
    if (!DEBUG_UI_ENABLED) return
    return registerAppDebugApi({ session })
  }, [session])

  return (
    <div className='app'>
      <canvas ref={canvasRef} className='game-canvas' aria-label='Snake board' />
      {closed ? (
        <QuitOverlay onReturn={handleReopen} />
      ) : (
        <>
          {snapshot.phase === 'menu' && (
            <MenuOverlay highScore={snapshot.highScore} onStart={() => session.start()} />
          )}
          {snapshot.phase === 'paused' && (
            <PauseOverlay onResume={() => session.resume()} onMenu={() => session.returnToMenu()} />
          )}
          {snapshot.phase === 'gameOver' && (
            <GameOverOverlay
              score={snapshot.score}
              highScore={snapshot.highScore}
              onRestart={() => session.restart()}
              onMenu={() => session.returnToMenu()}
            />
          )}
        </>
      )}
    </div>
  )
}
