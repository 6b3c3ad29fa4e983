import { fileURLToPath, URL } from 'node:url'
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

export const aliases = {
  '@game': fileURLToPath(new URL('./src/game', import.meta.url)),
  '@app': fileURLToPath(new URL('./src/app', import.meta.url)),
  '@shared': fileURLToPath(new URL('./src/shared', import.meta.url)),
}

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: aliases,
  },
  build: {
    rollupOptions: {
      output: {
        // Keep vendor libraries in their own chunk so app updates do not bust the React cache.
        manualChunks(id) {
          if (id.replaceAll('\\', '/').includes('/node_modules/')) {
            return 'vendor'
          }
        },
      },
    },
  },
})
