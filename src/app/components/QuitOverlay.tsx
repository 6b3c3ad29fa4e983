type QuitOverlayProps = {
  onReturn: () => void
}

export function QuitOverlay({ onReturn }: QuitOverlayProps) {
  return (
    <div className='overlay'>
      <div className='overlay-title'>Thanks for playing</div>
      <button type='button' onClick={onReturn}>
        Back to menu
      </button>
    </div>
  )
}
