/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SNAKE_DEBUG?: string
}
