import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// https://vitejs.dev/config/
export default defineConfig({
  plugins: [react()],
  // Relative base so the build can be served from any subdirectory
  base: './',
  build: {
    chunkSizeWarningLimit: 1000,
    rollupOptions: {
      output: {
        // Separate heavy libraries into their own files to improve caching
        manualChunks: {
          'recharts': ['recharts'],
          'vendor': ['react', 'react-dom', 'react-dropzone']
        }
      }
    }
  },
})
