type PauseOverlayProps = {
  onResume: () => void
  onMenu: () => void
}

export function PauseOverlay({ onResume, onMenu }: PauseOverlayProps) {
  return (
    <div className='overlay overlay--dimmed'>
      <div className='overlay-title'>Paused</div>
      <div className='overlay-subtitle'>Press Space to resume</div>
      <div className='overlay-actions'>
        <button type='button' onClick={onResume}>
          Resume
        </button>
        <button type='button' className='button--secondary' onClick={onMenu}>
          Menu
        </button>
      </div>
    </div>
  )
}
