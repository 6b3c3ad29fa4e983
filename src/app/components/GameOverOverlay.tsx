type GameOverOverlayProps = {
  score: number
  highScore: number
  onRestart: () => void
  onMenu: () => void
}

export function GameOverOverlay({ score, highScore, onRestart, onMenu }: GameOverOverlayProps) {
  const isNewBest = score > 0 && score === highScore
  return (
    <div className='overlay overlay--dimmed'>
      <div className='overlay-title'>Game over</div>
      <div className='overlay-subtitle'>Final score: {score}</div>
      {isNewBest && <div className='overlay-highlight'>New high score!</div>}
      <div className='overlay-actions'>
        <button type='button' onClick={onRestart}>
          Play again (R)
        </button>
        <button type='button' className='button--secondary' onClick={onMenu}>
          Menu (Esc)
        </button>
      </div>
    </div>
  )
}
