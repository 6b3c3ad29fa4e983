type MenuOverlayProps = {
  highScore: number
  onStart: () => void
}

export function MenuOverlay({ highScore, onStart }: MenuOverlayProps) {
  return (
    <div className='overlay menu-overlay'>
      <div className='menu-title' aria-label='Snake'>
        {'SNAKE'.split('').map((letter, index) => (
          <span key={index} className={`menu-title-letter menu-title-letter--${index % 5}`}>
            {letter}
          </span>
        ))}
      </div>
      <div className='overlay-subtitle'>Pixel Art Edition</div>

      <ul className='menu-instructions'>
        <li>Arrow keys or WASD to move</li>
        <li>Space to pause</li>
        <li>Esc to return to the menu</li>
      </ul>

      <button type='button' className='menu-play-button' onClick={onStart}>
        Start game
      </button>

      <div className='menu-high-score' aria-live='polite'>
        {highScore > 0 ? `High score: ${highScore}` : ' '}
      </div>
    </div>
  )
}
