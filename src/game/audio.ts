import type { MusicTrack, SoundEffect } from './types'
import { formatErrorMessage } from '@shared/errors/format'
import { silentLogger, type Logger } from '@shared/log/logger'

export type AudioSink = {
  playSound: (effect: SoundEffect) => void
  playMusic: (track: MusicTrack) => void
  stopMusic: () => void
}

export type AudioElementLike = {
  loop: boolean
  currentTime: number
  play: () => Promise<void>
  pause: () => void
}

export type AudioAssets = {
  music: Record<MusicTrack, string>
  sounds: Record<SoundEffect, string>
}

export const DEFAULT_AUDIO_ASSETS: AudioAssets = {
  music: {
    menu: '/audio/music/title.wav',
    playing: '/audio/music/main.wav',
    gameOver: '/audio/music/game_over.wav',
  },
  sounds: {
    foodEaten: '/audio/sfx/food.wav',
    pauseToggle: '/audio/sfx/pause.wav',
  },
}

export type HtmlAudioSinkOptions = {
  assets?: AudioAssets
  createElement?: (src: string) => AudioElementLike
  logger?: Logger
}

export const silentAudioSink: AudioSink = {
  playSound() {},
  playMusic() {},
  stopMusic() {},
}

const createBrowserAudio = (src: string): AudioElementLike => {
  const audio = new Audio(src)
  audio.preload = 'auto'
  return audio
}

export function createHtmlAudioSink(options: HtmlAudioSinkOptions = {}): AudioSink {
  const assets = options.assets ?? DEFAULT_AUDIO_ASSETS
  const createElement = options.createElement ?? createBrowserAudio
  const logger = options.logger ?? silentLogger
  const elements = new Map<string, AudioElementLike | null>()
  let currentTrack: MusicTrack | null = null
  let currentMusic: AudioElementLike | null = null

  const getElement = (src: string) => {
    if (elements.has(src)) return elements.get(src) ?? null
    let element: AudioElementLike | null = null
    try {
      element = createElement(src)
    } catch (error) {
      logger.warn(`could not load ${src}`, formatErrorMessage(error))
    }
    // Failed loads are remembered so the game does not retry every frame.
    elements.set(src, element)
    return element
  }

  const start = (element: AudioElementLike, label: string, onFailure?: () => void) => {
    try {
      element.play().catch((error: unknown) => {
        logger.warn(`${label} playback failed`, formatErrorMessage(error))
        onFailure?.()
      })
    } catch (error) {
      logger.warn(`${label} playback failed`, formatErrorMessage(error))
      onFailure?.()
    }
  }

  const stopMusic = () => {
    if (currentMusic) {
      try {
        currentMusic.pause()
        currentMusic.currentTime = 0
      } catch (error) {
        logger.warn('music stop failed', formatErrorMessage(error))
      }
    }
    currentMusic = null
    currentTrack = null
  }

  return {
    playSound(effect) {
      const element = getElement(assets.sounds[effect])
      if (!element) return
      element.currentTime = 0
      start(element, `sound ${effect}`)
    },
    playMusic(track) {
      if (currentTrack === track) return
      stopMusic()
      const element = getElement(assets.music[track])
      if (!element) return
      element.loop = track !== 'gameOver'
      currentTrack = track
      currentMusic = element
      start(element, `music ${track}`, () => {
        // Autoplay can be refused until the first user gesture; allow a retry.
        if (currentTrack === track) {
          currentTrack = null
          currentMusic = null
        }
      })
    },
    stopMusic,
  }
}
