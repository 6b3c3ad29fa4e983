export type Position = {
  x: number
  y: number
}

export type Direction = 'up' | 'down' | 'left' | 'right'

export type FoodKind = 'normal' | 'bonus'

export type GamePhase = 'menu' | 'playing' | 'paused' | 'gameOver'

export type TickStatus = 'continue' | 'gameOver' | 'idle'

export type Snake = {
  body: Position[]
  direction: Direction
  nextDirection: Direction
  growPending: boolean
}

export type Food = {
  position: Position | null
  kind: FoodKind
  value: number
  // Bonus only; normal food keeps 0 and never expires.
  ticksRemaining: number
  expired: boolean
}

export type GridConfig = {
  originX: number
  originY: number
  width: number
  height: number
  wallThickness: number
  cellSize: number
}

export type SnakeConfig = {
  initialLength: number
  initialHead: Position
  initialDirection: Direction
}

export type SpeedProgression = {
  initialTickRate: number
  maxTickRate: number
  scoreInterval: number
  increment: number
}

export type FoodConfig = {
  normalValue: number
  bonusValue: number
  bonusChance: number
  bonusLifetimeSeconds: number
  normalGrowth: number
  bonusGrowth: number
  maxPlacementAttempts: number
  fallbackPosition: Position
}

export type GameConfig = {
  grid: GridConfig
  snake: SnakeConfig
  speed: SpeedProgression
  food: FoodConfig
}

export type RandomSource = () => number

export type SoundEffect = 'foodEaten' | 'pauseToggle'

export type MusicTrack = 'menu' | 'playing' | 'gameOver'

export type FoodSnapshot = {
  position: Position | null
  kind: FoodKind
  value: number
  ticksRemaining: number
}

export type GameSnapshot = {
  phase: GamePhase
  snake: {
    body: Position[]
    direction: Direction
  }
  food: FoodSnapshot | null
  score: number
  highScore: number
  tickRate: number
}
