// vite.config.ts
import { defineConfig } from 'vite'
import { VitePWA } from 'vite-plugin-pwa'

export default defineConfig({
  plugins: [
    VitePWA({
      // auto register SW + update when new build is available
      registerType: 'autoUpdate',
      devOptions: { enabled: true },
      // level data lives in /public and is loaded at runtime
      includeAssets: ['maps/*.json'],
      workbox: {
        globPatterns: ['**/*.{js,css,html,json}']
      },
      manifest: {
        name: 'Maze Navigator',
        short_name: 'Maze',
        start_url: '.',
        scope: '.',
        display: 'standalone',
        background_color: '#000000',
        theme_color: '#000000'
      }
    })
  ],
  server: { port: 5173, open: true },
  build: { sourcemap: true }
})
